import { createDeadline, delay } from '../deadline.utils';
import { CancelledError, TimeoutError } from '../../errors/spamd.errors';

describe('deadline utils', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe('createDeadline', () => {
    it('should abort with a TimeoutError once the timeout elapses', () => {
      const deadline = createDeadline(100, undefined, (ms) => `CHECK timed out after ${ms}ms`);

      jest.advanceTimersByTime(99);
      expect(deadline.signal.aborted).toBe(false);

      jest.advanceTimersByTime(1);
      expect(deadline.signal.aborted).toBe(true);
      expect(deadline.signal.reason).toBeInstanceOf(TimeoutError);
      expect(deadline.signal.reason).toHaveProperty('message', 'CHECK timed out after 100ms');
    });

    it('should follow the parent signal', () => {
      const parent = new AbortController();
      const deadline = createDeadline(1000, parent.signal);

      parent.abort();

      expect(deadline.signal.aborted).toBe(true);
      expect(deadline.signal.reason).toBeInstanceOf(CancelledError);
    });

    it('should start aborted when the parent already is', () => {
      const parent = new AbortController();
      parent.abort(new TimeoutError('outer deadline'));

      const deadline = createDeadline(1000, parent.signal);

      expect(deadline.signal.reason).toHaveProperty('message', 'outer deadline');
    });

    it('should never fire after dispose', () => {
      const parent = new AbortController();
      const deadline = createDeadline(100, parent.signal);

      deadline.dispose();
      jest.advanceTimersByTime(200);
      parent.abort();

      expect(deadline.signal.aborted).toBe(false);
    });

    it('should not time out without a timeout', () => {
      const deadline = createDeadline(undefined, undefined);

      jest.advanceTimersByTime(60_000);

      expect(deadline.signal.aborted).toBe(false);
    });
  });

  describe('delay', () => {
    it('should resolve after the given time', async () => {
      const onResolved = jest.fn();
      const pending = delay(50).then(onResolved);

      await jest.advanceTimersByTimeAsync(50);
      await pending;

      expect(onResolved).toHaveBeenCalledTimes(1);
    });

    it('should reject when the signal aborts', async () => {
      const controller = new AbortController();
      const pending = delay(1000, controller.signal);

      controller.abort(new TimeoutError('gave up'));

      await expect(pending).rejects.toThrow('gave up');
    });

    it('should reject immediately for an aborted signal', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(delay(10, controller.signal)).rejects.toBeInstanceOf(CancelledError);
    });
  });
});
