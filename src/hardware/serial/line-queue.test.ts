import { ReadTimeoutError } from '$types/errors';
import { createLineQueue } from './line-queue';

const MAX_LINES = 100;

describe('line-queue', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('readLine', () => {
    it('should return a buffered line immediately', async () => {
      const queue = createLineQueue(MAX_LINES);
      queue.push(Buffer.from('1;2\n'));

      await expect(queue.readLine(1000)).resolves.toEqual(Buffer.from('1;2\n'));
      expect(queue.size()).toBe(0);
    });

    it('should keep lines in arrival order', async () => {
      const queue = createLineQueue(MAX_LINES);
      queue.push(Buffer.from('a\n'));
      queue.push(Buffer.from('b\n'));

      expect((await queue.readLine(1000)).toString()).toBe('a\n');
      expect((await queue.readLine(1000)).toString()).toBe('b\n');
    });

    it('should hand a later line to a waiting reader', async () => {
      const queue = createLineQueue(MAX_LINES);
      const pending = queue.readLine(1000);

      await vi.advanceTimersByTimeAsync(500);
      queue.push(Buffer.from('7\n'));

      await expect(pending).resolves.toEqual(Buffer.from('7\n'));
      expect(queue.size()).toBe(0);
    });

    it('should reject with ReadTimeoutError when nothing arrives', async () => {
      const queue = createLineQueue(MAX_LINES);
      const pending = queue.readLine(1000);
      const assertion = expect(pending).rejects.toBeInstanceOf(ReadTimeoutError);

      await vi.advanceTimersByTimeAsync(1000);
      await assertion;
    });

    it('should not hand a line to a reader that timed out', async () => {
      const queue = createLineQueue(MAX_LINES);
      const pending = queue.readLine(1000);
      const assertion = expect(pending).rejects.toThrow('No line received within 1000ms');

      await vi.advanceTimersByTimeAsync(1000);
      await assertion;

      queue.push(Buffer.from('late\n'));
      expect(queue.size()).toBe(1);
    });

    it('should reject waiting and later readers after a failure', async () => {
      const queue = createLineQueue(MAX_LINES);
      const pending = queue.readLine(1000);

      queue.fail(new Error('port closed'));

      await expect(pending).rejects.toThrow('port closed');
      await expect(queue.readLine(1000)).rejects.toThrow('port closed');
    });

    it('should drain buffered lines before surfacing a failure', async () => {
      const queue = createLineQueue(MAX_LINES);
      queue.push(Buffer.from('last\n'));
      queue.fail(new Error('port closed'));

      expect((await queue.readLine(1000)).toString()).toBe('last\n');
      await expect(queue.readLine(1000)).rejects.toThrow('port closed');
    });
  });

  describe('push', () => {
    it('should drop the oldest lines once the cap is reached', async () => {
      const queue = createLineQueue(3);
      for (let i = 1; i <= 5; i++) {
        queue.push(Buffer.from(i + '\n'));
      }

      expect(queue.size()).toBe(3);
      expect((await queue.readLine(1000)).toString()).toBe('3\n');
      expect((await queue.readLine(1000)).toString()).toBe('4\n');
      expect((await queue.readLine(1000)).toString()).toBe('5\n');
    });

    it('should stay bounded across a day of unread lines', () => {
      const queue = createLineQueue(3600);
      for (let i = 0; i < 86400; i++) {
        queue.push(Buffer.from('1;2\n'));
      }

      expect(queue.size()).toBe(3600);
    });
  });

  describe('waitForInput', () => {
    it('should resolve true when a line is already buffered', async () => {
      const queue = createLineQueue(MAX_LINES);
      queue.push(Buffer.from('x\n'));

      await expect(queue.waitForInput(500)).resolves.toBe(true);
      expect(queue.size()).toBe(1);
    });

    it('should resolve true as soon as a line arrives', async () => {
      const queue = createLineQueue(MAX_LINES);
      const pending = queue.waitForInput(500);

      await vi.advanceTimersByTimeAsync(100);
      queue.push(Buffer.from('x\n'));

      await expect(pending).resolves.toBe(true);
    });

    it('should resolve false after the timeout', async () => {
      const queue = createLineQueue(MAX_LINES);
      const pending = queue.waitForInput(500);

      await vi.advanceTimersByTimeAsync(500);

      await expect(pending).resolves.toBe(false);
    });

    it('should resolve true on failure so the next read reports it', async () => {
      const queue = createLineQueue(MAX_LINES);
      const pending = queue.waitForInput(500);

      queue.fail(new Error('gone'));

      await expect(pending).resolves.toBe(true);
    });
  });
});
