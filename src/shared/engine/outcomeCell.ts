import type { Outcome } from '../types/game';
import { EngineErrorCode, InvalidState } from './errors';

/**
 * Write-once holder for a game's outcome.
 *
 * Starts empty and accepts exactly one terminal value. Settling again with
 * the same value is a no-op; settling with a different value means the
 * engine evaluated two contradictory results for one game and throws.
 * That throw only signals an internal bug; no caller input can reach it.
 */
export class OutcomeCell {
  private value: Outcome | null = null;

  public get(): Outcome | null {
    return this.value;
  }

  public isSettled(): boolean {
    return this.value !== null;
  }

  /**
   * @returns true when this call set the outcome, false when it was already set
   */
  public settle(outcome: Outcome): boolean {
    if (this.value === null) {
      this.value = outcome;
      return true;
    }

    if (this.value !== outcome) {
      throw new InvalidState(
        EngineErrorCode.STATE_OUTCOME_CONFLICT,
        `Outcome already settled as ${this.value}, refusing ${outcome}`,
        { current: this.value, attempted: outcome },
        'OutcomeCell'
      );
    }

    return false;
  }
}
