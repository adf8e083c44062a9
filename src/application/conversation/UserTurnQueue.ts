/**
 * Runs work for the same user one item at a time, in arrival order.
 * Different users proceed concurrently.
 */
export class UserTurnQueue {
  private tails = new Map<string, Promise<void>>();

  run<T>(userId: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(userId) ?? Promise.resolve();
    const result = previous.then(work);

    const tail: Promise<void> = result.then(settle, settle).then(() => {
      if (this.tails.get(userId) === tail) {
        this.tails.delete(userId);
      }
    });
    this.tails.set(userId, tail);

    return result;
  }

  /**
   * Number of users with queued or running work.
   */
  activeUsers(): number {
    return this.tails.size;
  }
}

function settle(): void {}
