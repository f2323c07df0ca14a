// Runs enqueued jobs one at a time, in order. A rejected job does not stall the jobs behind it.
export class SerialQueue {
  private chain: Promise<void> = Promise.resolve();

  enqueue<T>(job: () => Promise<T>): Promise<T> {
    const run = this.chain.then(job, job);
    this.chain = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  // Resolves once every job enqueued so far has settled.
  async drain(): Promise<void> {
    await this.chain;
  }
}
