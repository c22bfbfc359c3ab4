// ========== GAME CONSTANTS ==========

export const NUM_PLAYERS = 4;
export const BOARD_SIZE = 20;
export const MIN_PROPERTY_COST = 50;
export const MAX_PROPERTY_COST = 200;
export const MIN_PROPERTY_RENT = 10;
export const MAX_PROPERTY_RENT = 100;
export const STARTING_BALANCE = 300;
export const LAP_SALARY = 100;
export const MAX_ROUNDS = 1000; // Match ends after 1000 rounds, richest player wins
export const DIE_FACES = 6;

export const DEMANDING_RENT_THRESHOLD = 50;
export const CAUTIOUS_RESERVE = 80;
export const RANDOM_BUY_PROBABILITY = 0.5;

// ========== ENUMS ==========

export enum StrategyKind {
  IMPULSIVE = "impulsive",
  DEMANDING = "demanding",
  CAUTIOUS = "cautious",
  RANDOM = "random",
}

/** Declaration order: turn order of a default match and every tie-break. */
export const STRATEGY_ORDER: readonly StrategyKind[] = [
  StrategyKind.IMPULSIVE,
  StrategyKind.DEMANDING,
  StrategyKind.CAUTIOUS,
  StrategyKind.RANDOM,
];

export enum GameStatus {
  RUNNING = "RUNNING",
  ENDED = "ENDED",
}

export enum EndReason {
  LAST_STANDING = "LAST_STANDING",
  TIMEOUT = "TIMEOUT",
}

// ========== CAPABILITIES ==========

/** Uniform float in [0, 1). */
export type RandomSource = () => number;

/** Integer in [1, DIE_FACES]. */
export type DiceRoller = () => number;

/** Uniform integer in the closed range [min, max]. */
export type IntegerDraw = (min: number, max: number) => number;

// ========== VIEWS ==========

/** What a purchase strategy may see of the buyer. */
export interface BuyerView {
  readonly balance: number;
}

/** What a purchase strategy may see of the candidate property. */
export interface PropertyView {
  readonly cost: number;
  readonly rent: number;
}

export interface PurchaseStrategy {
  readonly kind: StrategyKind;
  shouldBuy(player: BuyerView, property: PropertyView): boolean;
}

// ========== EVENTS ==========

export type GameEvent =
  | { type: "gameStarted"; matchId: string; players: number; boardSize: number }
  | { type: "diceRolled"; player: number; roll: number }
  | { type: "playerMoved"; player: number; from: number; to: number; lapped: boolean }
  | { type: "lapSalaryPaid"; player: number; amount: number }
  | { type: "propertyBought"; player: number; position: number; cost: number; rent: number; balanceAfter: number }
  | { type: "propertyDeclined"; player: number; position: number; cost: number; rent: number }
  | { type: "rentPaid"; from: number; to: number; position: number; amount: number }
  | { type: "playerEliminated"; player: number; balance: number; released: number; round: number }
  | { type: "roundCompleted"; round: number; activePlayers: number }
  | { type: "gameEnded"; winner: number; reason: EndReason; rounds: number };

// ========== RESULTS ==========

export interface PlayerSummary {
  id: number;
  name: string;
  strategy: StrategyKind;
  balance: number;
  position: number;
  propertiesOwned: number;
  active: boolean;
}

export interface WinnerInfo {
  id: number;
  name: string;
  strategy: StrategyKind;
}

export interface MatchResult {
  matchId: string;
  winner: WinnerInfo | null;
  winnerStrategy: StrategyKind | null;
  rounds: number;
  timedOut: boolean;
  endReason: EndReason | null;
  players: PlayerSummary[];
}

export interface GameSnapshot {
  matchId: string;
  status: GameStatus;
  round: number;
  turn: number;
  activeCount: number;
  players: PlayerSummary[];
  properties: Array<{
    position: number;
    cost: number;
    rent: number;
    ownerId: number; // player id, or -1 if unowned
  }>;
  winner: number; // player id, or -1
}
