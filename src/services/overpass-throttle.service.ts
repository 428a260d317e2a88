/**
 * Overpass request throttle
 * Serializes Overpass API requests with a minimum delay between calls
 * to avoid rate limits (429). Each OverpassGeodataClient owns one.
 */

type QueuedTask = () => Promise<void>;

export class RequestThrottle {
  private readonly queue: QueuedTask[] = [];
  private processing = false;
  private lastRequestTime = 0;

  constructor(private readonly minIntervalMs: number) {}

  /**
   * Run a request through the queue.
   * Ensures at least minIntervalMs between the start of each request.
   */
  run<T>(fn: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(async () => {
        try {
          resolve(await fn());
        } catch (e) {
          reject(e);
        }
      });
      void this.processQueue();
    });
  }

  private async processQueue(): Promise<void> {
    if (this.processing) return;
    this.processing = true;

    let task = this.queue.shift();
    while (task) {
      const wait = Math.max(0, this.minIntervalMs - (Date.now() - this.lastRequestTime));
      if (wait > 0) await new Promise((r) => setTimeout(r, wait));

      this.lastRequestTime = Date.now();
      await task();
      task = this.queue.shift();
    }

    this.processing = false;
  }
}
