/**
 * Bounded FIFO channel feeding the executor loop. Senders suspend while the
 * buffer is full; the single receiver suspends while it is empty.
 */
export class Mailbox<T> {
  private readonly buffer: T[] = [];
  private readonly receivers: Array<(value: T | null) => void> = [];
  private readonly blockedSenders: Array<{ message: T; admit: (accepted: boolean) => void }> = [];
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`mailbox capacity must be a positive integer (received ${capacity})`);
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Number of buffered messages, blocked senders excluded. */
  get size(): number {
    return this.buffer.length;
  }

  /**
   * Enqueues a message. Resolves `true` once the message sits in the buffer (or
   * went straight to a waiting receiver), `false` when the mailbox is closed
   * before it could be admitted.
   */
  send(message: T): Promise<boolean> {
    if (this.closed) {
      return Promise.resolve(false);
    }
    const receiver = this.receivers.shift();
    if (receiver) {
      receiver(message);
      return Promise.resolve(true);
    }
    if (this.buffer.length < this.capacity) {
      this.buffer.push(message);
      return Promise.resolve(true);
    }
    return new Promise((admit) => {
      this.blockedSenders.push({ message, admit });
    });
  }

  /** Next message in FIFO order, or `null` once the mailbox is closed and drained. */
  receive(): Promise<T | null> {
    const next = this.buffer.shift();
    if (next !== undefined) {
      const sender = this.blockedSenders.shift();
      if (sender) {
        this.buffer.push(sender.message);
        sender.admit(true);
      }
      return Promise.resolve(next);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      this.receivers.push(resolve);
    });
  }

  /**
   * Stops admitting messages. Buffered messages stay receivable; blocked
   * senders are turned away and idle receivers observe the end of the stream.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const sender of this.blockedSenders.splice(0)) {
      sender.admit(false);
    }
    for (const receiver of this.receivers.splice(0)) {
      receiver(null);
    }
  }
}

/**
 * Single-use reply channel attached to a command. Only the first settlement
 * takes effect; the executor settles every slot exactly once.
 */
export class ReplySlot<T> {
  readonly promise: Promise<T>;
  private resolveFn: (value: T) => void = () => undefined;
  private rejectFn: (reason: unknown) => void = () => undefined;
  private settled = false;

  constructor() {
    this.promise = new Promise<T>((resolve, reject) => {
      this.resolveFn = resolve;
      this.rejectFn = reject;
    });
  }

  get isSettled(): boolean {
    return this.settled;
  }

  resolve(value: T): boolean {
    if (this.settled) {
      return false;
    }
    this.settled = true;
    this.resolveFn(value);
    return true;
  }

  reject(reason: unknown): boolean {
    if (this.settled) {
      return false;
    }
    this.settled = true;
    this.rejectFn(reason);
    return true;
  }

  /** Runs the handler and settles the slot with its outcome. Never throws. */
  async settle(handler: () => T | Promise<T>): Promise<void> {
    try {
      this.resolve(await handler());
    } catch (error) {
      this.reject(error);
    }
  }
}
