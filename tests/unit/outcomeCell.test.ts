import { EngineErrorCode, InvalidState } from '../../src/shared/engine/errors';
import { OutcomeCell } from '../../src/shared/engine/outcomeCell';

describe('OutcomeCell', () => {
  it('should start empty', () => {
    const cell = new OutcomeCell();

    expect(cell.get()).toBeNull();
    expect(cell.isSettled()).toBe(false);
  });

  it('should accept the first outcome', () => {
    const cell = new OutcomeCell();

    expect(cell.settle('o_wins')).toBe(true);
    expect(cell.get()).toBe('o_wins');
    expect(cell.isSettled()).toBe(true);
  });

  it('should treat settling the same outcome again as a no-op', () => {
    const cell = new OutcomeCell();
    cell.settle('tie');

    expect(cell.settle('tie')).toBe(false);
    expect(cell.get()).toBe('tie');
  });

  it('should throw InvalidState when a different outcome is written', () => {
    const cell = new OutcomeCell();
    cell.settle('x_wins');

    let thrown: unknown;
    try {
      cell.settle('o_wins');
    } catch (err) {
      thrown = err;
    }

    expect(thrown).toBeInstanceOf(InvalidState);
    if (thrown instanceof InvalidState) {
      expect(thrown.code).toBe(EngineErrorCode.STATE_OUTCOME_CONFLICT);
      expect(thrown.domain).toBe('OutcomeCell');
      expect(thrown.context).toEqual({ current: 'x_wins', attempted: 'o_wins' });
    }
    expect(cell.get()).toBe('x_wins');
  });
});
