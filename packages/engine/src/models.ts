import { GameConfigurationError, InvalidGameStateError } from "./errors";
import { type PlayerSummary, type PurchaseStrategy, STARTING_BALANCE } from "./types";

// ========== PROPERTY ==========

/**
 * A board square. Cost and rent are fixed when the board is generated;
 * ownership is changed only through assignTo() / release().
 */
export class Property {
  readonly position: number;
  readonly cost: number;
  readonly rent: number;
  private _owner: Player | null = null;

  constructor(position: number, cost: number, rent: number) {
    if (!Number.isInteger(position) || position < 0) {
      throw new GameConfigurationError(`Property position must be a non-negative integer, got ${position}`);
    }
    if (!Number.isInteger(cost) || cost <= 0) {
      throw new GameConfigurationError(`Property cost must be a positive integer, got ${cost}`);
    }
    if (!Number.isInteger(rent) || rent < 0) {
      throw new GameConfigurationError(`Property rent must be a non-negative integer, got ${rent}`);
    }
    this.position = position;
    this.cost = cost;
    this.rent = rent;
  }

  get owner(): Player | null {
    return this._owner;
  }

  isOwned(): boolean {
    return this._owner !== null;
  }

  assignTo(player: Player): void {
    if (!player.active) {
      throw new InvalidGameStateError(`Player ${player.name} is eliminated and cannot own property ${this.position}`);
    }
    if (this._owner !== null && this._owner !== player) {
      throw new InvalidGameStateError(`Property ${this.position} is already owned by ${this._owner.name}`);
    }
    this._owner = player;
  }

  release(): void {
    this._owner = null;
  }
}

// ========== PLAYER ==========

export interface MoveOutcome {
  from: number;
  to: number;
  lapped: boolean;
}

export class Player {
  readonly id: number;
  readonly name: string;
  readonly strategy: PurchaseStrategy;
  balance: number;
  position = 0;
  active = true;
  readonly ownedProperties: Set<Property> = new Set();

  constructor(id: number, name: string, strategy: PurchaseStrategy, startingBalance: number = STARTING_BALANCE) {
    if (!name.trim()) {
      throw new GameConfigurationError("Player name cannot be empty");
    }
    if (!Number.isInteger(startingBalance) || startingBalance < 0) {
      throw new GameConfigurationError(`Starting balance must be a non-negative integer, got ${startingBalance}`);
    }
    this.id = id;
    this.name = name;
    this.strategy = strategy;
    this.balance = startingBalance;
  }

  /**
   * Move forward around a board of `boardSize` squares. Reaching or passing
   * square 0 is a completed lap and pays `salary` once, however many
   * times the move wraps.
   */
  advance(steps: number, boardSize: number, salary: number): MoveOutcome {
    if (!Number.isInteger(steps) || steps <= 0) {
      throw new InvalidGameStateError(`Steps must be a positive integer, got ${steps}`);
    }
    if (!Number.isInteger(boardSize) || boardSize <= 0) {
      throw new InvalidGameStateError(`Board size must be a positive integer, got ${boardSize}`);
    }
    if (salary < 0) {
      throw new InvalidGameStateError(`Lap salary cannot be negative, got ${salary}`);
    }
    const from = this.position;
    const to = (from + steps) % boardSize;
    const lapped = from + steps >= boardSize;
    this.position = to;
    if (lapped) {
      this.balance += salary;
    }
    return { from, to, lapped };
  }

  canAfford(cost: number): boolean {
    return this.balance >= cost;
  }

  /** Debit the cost and take ownership. Never takes the balance below zero. */
  buy(property: Property): void {
    if (!this.canAfford(property.cost)) {
      throw new InvalidGameStateError(
        `${this.name} cannot afford property ${property.position} (cost ${property.cost}, balance ${this.balance})`,
      );
    }
    property.assignTo(this);
    this.balance -= property.cost;
    this.ownedProperties.add(property);
  }

  /** Pay rent to `owner`. The payer's balance may go negative here. */
  payRent(amount: number, owner: Player): void {
    if (amount < 0) {
      throw new InvalidGameStateError(`Rent cannot be negative, got ${amount}`);
    }
    this.balance -= amount;
    owner.balance += amount;
  }

  /** Leave the match; every owned property goes back to the bank. */
  eliminate(): Property[] {
    this.active = false;
    const released = Array.from(this.ownedProperties);
    for (const property of released) {
      property.release();
    }
    this.ownedProperties.clear();
    return released;
  }

  summary(): PlayerSummary {
    return {
      id: this.id,
      name: this.name,
      strategy: this.strategy.kind,
      balance: this.balance,
      position: this.position,
      propertiesOwned: this.ownedProperties.size,
      active: this.active,
    };
  }
}

// ========== BOARD ==========

export class Board {
  readonly properties: readonly Property[];

  constructor(properties: Property[]) {
    if (properties.length === 0) {
      throw new GameConfigurationError("Board must have at least one property");
    }
    properties.forEach((p, i) => {
      if (p.position !== i) {
        throw new GameConfigurationError(`Property at index ${i} has position ${p.position}`);
      }
    });
    this.properties = [...properties];
  }

  get size(): number {
    return this.properties.length;
  }

  propertyAt(position: number): Property {
    const property = this.properties[position];
    if (!property) {
      throw new InvalidGameStateError(`No property at position ${position} (board size ${this.size})`);
    }
    return property;
  }
}
