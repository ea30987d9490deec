/**
 * Unbuffered channel: rendezvous hand-off between async tasks
 *
 * A send completes only when a receiver takes the value. Operations that
 * share a SelectClaim form a select: exactly one of them commits, the others
 * are withdrawn. Both operations observe an optional AbortSignal.
 */

/**
 * Commit token shared by the operations of one select
 */
export class SelectClaim {
  private done = false;
  private cleanups: Array<() => void> = [];

  get settled(): boolean {
    return this.done;
  }

  /**
   * Commit the claim; false if an operation already committed it
   */
  commit(): boolean {
    if (this.done) {
      return false;
    }
    this.done = true;
    const cleanups = this.cleanups;
    this.cleanups = [];
    for (const cleanup of cleanups) {
      cleanup();
    }
    return true;
  }

  onSettle(cleanup: () => void): void {
    if (this.done) {
      cleanup();
      return;
    }
    this.cleanups.push(cleanup);
  }
}

export type ChannelOpOptions = {
  signal?: AbortSignal;
  /** Share with another operation to select between them */
  claim?: SelectClaim;
};

type ParkedSender<T> = {
  claim: SelectClaim;
  value: T;
  delivered: () => void;
};

type ParkedReceiver<T> = {
  claim: SelectClaim;
  deliver: (value: T) => void;
};

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new Error("operation aborted");
}

function removeItem<T>(items: T[], item: T): void {
  const index = items.indexOf(item);
  if (index !== -1) {
    items.splice(index, 1);
  }
}

export class Channel<T> {
  private readonly senders: ParkedSender<T>[] = [];
  private readonly receivers: ParkedReceiver<T>[] = [];

  /**
   * Hand a value to a receiver
   *
   * Resolves once a receiver has taken the value; rejects with the signal's
   * reason if aborted first. A send that loses a select never settles.
   */
  send(value: T, options: ChannelOpOptions = {}): Promise<void> {
    const claim = options.claim ?? new SelectClaim();
    const { signal } = options;

    return new Promise<void>((resolve, reject) => {
      if (claim.settled) {
        return;
      }
      if (signal?.aborted) {
        claim.commit();
        reject(abortReason(signal));
        return;
      }

      let receiver = this.receivers.shift();
      while (receiver) {
        if (!receiver.claim.settled) {
          receiver.claim.commit();
          claim.commit();
          receiver.deliver(value);
          resolve();
          return;
        }
        receiver = this.receivers.shift();
      }

      const parked: ParkedSender<T> = { claim, value, delivered: resolve };
      this.senders.push(parked);
      claim.onSettle(() => removeItem(this.senders, parked));
      this.watchAbort(claim, signal, reject);
    });
  }

  /**
   * Take a value from a sender
   *
   * Resolves with the value; rejects with the signal's reason if aborted
   * first. A receive that loses a select never settles.
   */
  receive(options: ChannelOpOptions = {}): Promise<T> {
    const claim = options.claim ?? new SelectClaim();
    const { signal } = options;

    return new Promise<T>((resolve, reject) => {
      if (claim.settled) {
        return;
      }
      if (signal?.aborted) {
        claim.commit();
        reject(abortReason(signal));
        return;
      }

      let sender = this.senders.shift();
      while (sender) {
        if (!sender.claim.settled) {
          sender.claim.commit();
          claim.commit();
          sender.delivered();
          resolve(sender.value);
          return;
        }
        sender = this.senders.shift();
      }

      const parked: ParkedReceiver<T> = { claim, deliver: resolve };
      this.receivers.push(parked);
      claim.onSettle(() => removeItem(this.receivers, parked));
      this.watchAbort(claim, signal, reject);
    });
  }

  /**
   * Number of parked senders and receivers (for diagnostics and tests)
   */
  get waiting(): { senders: number; receivers: number } {
    return { senders: this.senders.length, receivers: this.receivers.length };
  }

  private watchAbort(
    claim: SelectClaim,
    signal: AbortSignal | undefined,
    reject: (reason: unknown) => void,
  ): void {
    if (!signal) {
      return;
    }
    const onAbort = (): void => {
      if (claim.commit()) {
        reject(abortReason(signal));
      }
    };
    signal.addEventListener("abort", onAbort, { once: true });
    claim.onSettle(() => signal.removeEventListener("abort", onAbort));
  }
}
