import { RequestState } from './request-state';
import { Intent, ValidatorState } from '../rag.types';

describe('RequestState', () => {
  let state: RequestState;

  beforeEach(() => {
    state = new RequestState({ userQuery: 'What degree did you study?', stream: false });
  });

  it('should start pending with no intent', () => {
    expect(state.intent).toBeNull();
    expect(state.retryCount).toBe(0);
    expect(state.metadata.validation.state).toBe(ValidatorState.PENDING);
    expect(state.signal.aborted).toBe(false);
  });

  it('should accept the intent exactly once', () => {
    state.assignIntent(Intent.EDUCATION);

    expect(state.requireIntent()).toBe(Intent.EDUCATION);
    expect(() => state.assignIntent(Intent.SKILLS)).toThrow(
      'Intent already assigned (EDUCATION); it cannot change to SKILLS',
    );
  });

  it('should refuse to read an unassigned intent', () => {
    expect(() => state.requireIntent()).toThrow('Intent has not been classified yet');
  });

  it('should count retries up to the budget', () => {
    expect(state.incrementRetry(2)).toBe(1);
    expect(state.incrementRetry(2)).toBe(2);
    expect(() => state.incrementRetry(2)).toThrow('Retry budget of 2 exhausted');
    expect(state.retryCount).toBe(2);
  });

  it('should record each degradation reason once', () => {
    state.markDegraded('semantic_unavailable: offline');
    state.markDegraded('semantic_unavailable: offline');
    state.markDegraded('retrieve_timeout');

    expect(state.metadata.degraded).toBe(true);
    expect(state.metadata.degradedReasons).toEqual([
      'semantic_unavailable: offline',
      'retrieve_timeout',
    ]);
  });

  it('should give every request its own id', () => {
    const other = new RequestState({ userQuery: 'x', stream: false });

    expect(other.requestId).not.toBe(state.requestId);
  });
});
