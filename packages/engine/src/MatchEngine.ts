import { randomUUID } from "node:crypto";
import { GameConfigurationError, InvalidGameStateError } from "./errors";
import type { Board, Player, Property } from "./models";
import {
  DIE_FACES, type DiceRoller, EndReason, type GameEvent, type GameSnapshot, GameStatus,
  LAP_SALARY, MAX_ROUNDS, type MatchResult,
} from "./types";

export interface MatchOptions {
  maxRounds?: number;
  lapSalary?: number;
  matchId?: string;
  /** Keep every event in `events`. Off by default. */
  recordEvents?: boolean;
  onEvent?: (event: GameEvent) => void;
}

export interface MatchState {
  players: Player[]; // turn order
  board: Board;
  status: GameStatus;
  endReason: EndReason | null;
  winner: Player | null;
  roundCount: number;
  turnCount: number;
}

/**
 * Runs one match: rounds of turns until a single player is left or the round
 * cap is reached. Strictly sequential; owns its players and board for the
 * whole match.
 */
export class MatchEngine {
  readonly matchId: string;
  state: MatchState;
  events: GameEvent[] = [];
  private rollDie: DiceRoller;
  private maxRounds: number;
  private lapSalary: number;
  private recordEvents: boolean;
  private onEvent?: (event: GameEvent) => void;

  constructor(players: Player[], board: Board, rollDie: DiceRoller, options: MatchOptions = {}) {
    if (players.length === 0) {
      throw new GameConfigurationError("Players list cannot be empty");
    }
    const ids = new Set(players.map(p => p.id));
    if (ids.size !== players.length) {
      throw new GameConfigurationError("Player ids must be unique");
    }
    const maxRounds = options.maxRounds ?? MAX_ROUNDS;
    if (!Number.isInteger(maxRounds) || maxRounds <= 0) {
      throw new GameConfigurationError(`Max rounds must be a positive integer, got ${maxRounds}`);
    }
    const lapSalary = options.lapSalary ?? LAP_SALARY;
    if (lapSalary < 0) {
      throw new GameConfigurationError(`Lap salary cannot be negative, got ${lapSalary}`);
    }

    this.matchId = options.matchId ?? randomUUID();
    this.rollDie = rollDie;
    this.maxRounds = maxRounds;
    this.lapSalary = lapSalary;
    this.recordEvents = options.recordEvents ?? false;
    this.onEvent = options.onEvent;

    this.state = {
      players,
      board,
      status: GameStatus.RUNNING,
      endReason: null,
      winner: null,
      roundCount: 0,
      turnCount: 0,
    };

    this.emit({ type: "gameStarted", matchId: this.matchId, players: players.length, boardSize: board.size });
  }

  // ========== PUBLIC API ==========

  get gameOver(): boolean {
    return this.state.status === GameStatus.ENDED;
  }

  get timedOut(): boolean {
    return this.state.endReason === EndReason.TIMEOUT;
  }

  activePlayers(): Player[] {
    return this.state.players.filter(p => p.active);
  }

  /**
   * Play rounds until the match ends. Always terminates: the round cap
   * bounds it.
   */
  run(): MatchResult {
    while (!this.gameOver) {
      this.playRound();
    }
    return this.getResult();
  }

  /**
   * One pass over the players active at the start of the round, then the
   * terminal check.
   */
  playRound(): void {
    if (this.gameOver) {
      throw new InvalidGameStateError("Match already ended");
    }

    const roster = this.activePlayers();
    for (const player of roster) {
      this.playTurn(player);
    }

    this.state.roundCount++;
    this.emit({ type: "roundCompleted", round: this.state.roundCount, activePlayers: this.activePlayers().length });
    this.checkTerminal();
  }

  /**
   * One turn: roll, move, resolve the landing square, then the elimination
   * check. An eliminated player is skipped; a player from another match is
   * rejected.
   */
  playTurn(player: Player): void {
    if (this.gameOver) {
      throw new InvalidGameStateError("Match already ended");
    }
    if (!this.state.players.includes(player)) {
      throw new InvalidGameStateError(`Player ${player.name} is not in this match`);
    }
    if (!player.active) return;

    const roll = this.rollDie();
    if (!Number.isInteger(roll) || roll < 1 || roll > DIE_FACES) {
      throw new InvalidGameStateError(`Dice roll must be an integer in [1, ${DIE_FACES}], got ${roll}`);
    }
    this.state.turnCount++;
    this.emit({ type: "diceRolled", player: player.id, roll });

    this.movePlayer(player, roll);
    this.resolveLanding(player, this.state.board.propertyAt(player.position));

    if (player.balance < 0) {
      this.eliminate(player);
    }
  }

  getResult(): MatchResult {
    const winner = this.state.winner;
    return {
      matchId: this.matchId,
      winner: winner ? { id: winner.id, name: winner.name, strategy: winner.strategy.kind } : null,
      winnerStrategy: winner ? winner.strategy.kind : null,
      rounds: this.state.roundCount,
      timedOut: this.timedOut,
      endReason: this.state.endReason,
      players: this.state.players.map(p => p.summary()),
    };
  }

  getSnapshot(): GameSnapshot {
    return {
      matchId: this.matchId,
      status: this.state.status,
      round: this.state.roundCount,
      turn: this.state.turnCount,
      activeCount: this.activePlayers().length,
      players: this.state.players.map(p => p.summary()),
      properties: this.state.board.properties.map(p => ({
        position: p.position,
        cost: p.cost,
        rent: p.rent,
        ownerId: p.owner ? p.owner.id : -1,
      })),
      winner: this.state.winner ? this.state.winner.id : -1,
    };
  }

  // ========== PRIVATE: GAME LOGIC ==========

  private movePlayer(player: Player, steps: number): void {
    const { from, to, lapped } = player.advance(steps, this.state.board.size, this.lapSalary);
    this.emit({ type: "playerMoved", player: player.id, from, to, lapped });
    if (lapped) {
      this.emit({ type: "lapSalaryPaid", player: player.id, amount: this.lapSalary });
    }
  }

  private resolveLanding(player: Player, property: Property): void {
    const owner = property.owner;

    if (owner === null) {
      // Affordability first: an unaffordable property never reaches the strategy
      if (!player.canAfford(property.cost)) return;
      if (player.strategy.shouldBuy(player, property)) {
        player.buy(property);
        this.emit({
          type: "propertyBought",
          player: player.id,
          position: property.position,
          cost: property.cost,
          rent: property.rent,
          balanceAfter: player.balance,
        });
      } else {
        this.emit({
          type: "propertyDeclined",
          player: player.id,
          position: property.position,
          cost: property.cost,
          rent: property.rent,
        });
      }
      return;
    }

    if (owner === player) return;

    player.payRent(property.rent, owner);
    this.emit({ type: "rentPaid", from: player.id, to: owner.id, position: property.position, amount: property.rent });
  }

  private eliminate(player: Player): void {
    const balance = player.balance;
    const released = player.eliminate();
    this.emit({
      type: "playerEliminated",
      player: player.id,
      balance,
      released: released.length,
      round: this.state.roundCount + 1,
    });
  }

  private checkTerminal(): void {
    const active = this.activePlayers();

    if (active.length === 1) {
      this.end(EndReason.LAST_STANDING, active[0]);
      return;
    }

    if (active.length === 0) {
      this.end(EndReason.LAST_STANDING, null);
      return;
    }

    if (this.state.roundCount >= this.maxRounds) {
      this.end(EndReason.TIMEOUT, richest(active));
    }
  }

  private end(reason: EndReason, winner: Player | null): void {
    this.state.status = GameStatus.ENDED;
    this.state.endReason = reason;
    this.state.winner = winner;
    this.emit({ type: "gameEnded", winner: winner ? winner.id : -1, reason, rounds: this.state.roundCount });
  }

  // ========== PRIVATE: HELPERS ==========

  private emit(event: GameEvent): void {
    if (this.recordEvents) this.events.push(event);
    this.onEvent?.(event);
  }
}

/** Strictly highest balance wins; a tie goes to the earlier player in turn order. */
function richest(players: Player[]): Player {
  let best = players[0];
  for (const p of players) {
    if (p.balance > best.balance) best = p;
  }
  return best;
}
