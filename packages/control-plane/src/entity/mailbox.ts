/**
 * Priority mailbox backing an entity actor.
 *
 * Work items run one at a time, in priority order, FIFO within a priority.
 * An item enqueued while another runs waits for it to settle, so an
 * EmergencyStop overtakes queued work but never interrupts the item in
 * progress.
 */

export type MessagePriority = "emergency" | "normal" | "background"

const PRIORITY_ORDER: readonly MessagePriority[] = ["emergency", "normal", "background"]

interface Envelope {
  run: () => Promise<void>
}

export class MailboxClosedError extends Error {
  constructor() {
    super("Mailbox is closed")
    this.name = "MailboxClosedError"
  }
}

export class PriorityMailbox {
  private readonly queues: Record<MessagePriority, Envelope[]> = {
    emergency: [],
    normal: [],
    background: [],
  }
  private draining: Promise<void> | null = null
  private closed = false

  /** Queue `work` and resolve with its result once it has run. */
  enqueue<T>(priority: MessagePriority, work: () => Promise<T> | T): Promise<T> {
    if (this.closed) {
      return Promise.reject(new MailboxClosedError())
    }

    return new Promise<T>((resolve, reject) => {
      this.queues[priority].push({
        run: async () => {
          try {
            resolve(await work())
          } catch (err) {
            reject(err)
          }
        },
      })
      this.schedule()
    })
  }

  get size(): number {
    return PRIORITY_ORDER.reduce((total, p) => total + this.queues[p].length, 0)
  }

  /** Resolves once every queued item has run. */
  async idle(): Promise<void> {
    while (this.draining) {
      await this.draining
    }
  }

  /** Reject new work, then wait for queued work to finish. */
  async close(): Promise<void> {
    this.closed = true
    await this.idle()
  }

  get isClosed(): boolean {
    return this.closed
  }

  private schedule(): void {
    if (this.draining) return
    this.draining = this.drain()
  }

  private async drain(): Promise<void> {
    // Let items enqueued in the same tick land before picking by priority.
    await Promise.resolve()
    for (let next = this.dequeue(); next; next = this.dequeue()) {
      await next.run()
    }
    this.draining = null
  }

  private dequeue(): Envelope | undefined {
    for (const priority of PRIORITY_ORDER) {
      const envelope = this.queues[priority].shift()
      if (envelope) return envelope
    }
    return undefined
  }
}
