/** Base class for every rule or setup violation raised by the engine. */
export class GameError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GameError";
  }
}

/** Invalid parameters for a board, player, strategy or match. */
export class GameConfigurationError extends GameError {
  constructor(message: string) {
    super(message);
    this.name = "GameConfigurationError";
  }
}

/** An operation that the current match state does not allow. */
export class InvalidGameStateError extends GameError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidGameStateError";
  }
}
