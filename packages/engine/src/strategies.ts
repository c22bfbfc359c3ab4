import { GameConfigurationError } from "./errors";
import {
  type BuyerView, CAUTIOUS_RESERVE, DEMANDING_RENT_THRESHOLD, type PropertyView, type PurchaseStrategy,
  RANDOM_BUY_PROBABILITY, type RandomSource, StrategyKind,
} from "./types";

/**
 * Impulsive: buys every property it lands on and can afford.
 */
export class ImpulsiveStrategy implements PurchaseStrategy {
  readonly kind = StrategyKind.IMPULSIVE;

  shouldBuy(_player: BuyerView, _property: PropertyView): boolean {
    return true;
  }
}

/**
 * Demanding: only buys when the rent is above the threshold (strictly).
 */
export class DemandingStrategy implements PurchaseStrategy {
  readonly kind = StrategyKind.DEMANDING;

  constructor(readonly rentThreshold: number = DEMANDING_RENT_THRESHOLD) {
    if (rentThreshold < 0) {
      throw new GameConfigurationError(`Rent threshold cannot be negative, got ${rentThreshold}`);
    }
  }

  shouldBuy(_player: BuyerView, property: PropertyView): boolean {
    return property.rent > this.rentThreshold;
  }
}

/**
 * Cautious: only buys when at least `reserve` remains after paying.
 */
export class CautiousStrategy implements PurchaseStrategy {
  readonly kind = StrategyKind.CAUTIOUS;

  constructor(readonly reserve: number = CAUTIOUS_RESERVE) {
    if (reserve < 0) {
      throw new GameConfigurationError(`Reserve cannot be negative, got ${reserve}`);
    }
  }

  shouldBuy(player: BuyerView, property: PropertyView): boolean {
    return player.balance - property.cost >= this.reserve;
  }
}

/**
 * Random: buys with the given probability, drawn from the injected source.
 */
export class RandomStrategy implements PurchaseStrategy {
  readonly kind = StrategyKind.RANDOM;

  constructor(
    private readonly chance: RandomSource,
    readonly probability: number = RANDOM_BUY_PROBABILITY,
  ) {
    if (probability < 0 || probability > 1) {
      throw new GameConfigurationError(`Buy probability must be within [0, 1], got ${probability}`);
    }
  }

  shouldBuy(_player: BuyerView, _property: PropertyView): boolean {
    return this.chance() < this.probability;
  }
}

export function createStrategy(kind: StrategyKind, chance: RandomSource): PurchaseStrategy {
  switch (kind) {
    case StrategyKind.IMPULSIVE:
      return new ImpulsiveStrategy();
    case StrategyKind.DEMANDING:
      return new DemandingStrategy();
    case StrategyKind.CAUTIOUS:
      return new CautiousStrategy();
    case StrategyKind.RANDOM:
      return new RandomStrategy(chance);
  }
}
