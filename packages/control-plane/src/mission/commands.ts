/**
 * Directive delivery with acknowledgement timeout and retries.
 *
 * Delivery runs off the actor's critical path: `send()` returns at once and
 * the outcome is reported through the callback, which the actor turns into
 * a mailbox message. Retries reuse the directive's commandId so the vehicle
 * side can de-duplicate.
 */

import type { Directive } from "@aether/shared/fleet"
import type { TracingLogger } from "@aether/shared/tracing"

import { CommandTimeoutError } from "../errors.js"
import type { TransportLink } from "../fleet/collaborators.js"
import { classifyError } from "../transport/error-classifier.js"

export interface CommandOptions {
  ackTimeoutMs: number
  /** Attempts after the first one. */
  maxRetries: number
}

export type CommandOutcome =
  | { status: "acked"; directive: Directive }
  | { status: "failed"; directive: Directive; error: CommandTimeoutError }

export class CommandDispatcher {
  private readonly transport: TransportLink
  private readonly options: CommandOptions
  private readonly logger: TracingLogger
  private readonly inflight = new Set<Promise<void>>()
  private readonly abort = new AbortController()

  constructor(transport: TransportLink, options: CommandOptions, logger: TracingLogger) {
    this.transport = transport
    this.options = options
    this.logger = logger
  }

  send(directive: Directive, onOutcome: (outcome: CommandOutcome) => void): void {
    const delivery: Promise<void> = this.deliver(directive)
      .then(onOutcome)
      .catch((err: unknown) => {
        this.logger.error("directive outcome handler failed", {
          commandId: directive.commandId,
          error: err,
        })
      })
      .finally(() => this.inflight.delete(delivery))
    this.inflight.add(delivery)
  }

  get pending(): number {
    return this.inflight.size
  }

  /** Wait for every in-flight delivery to report. */
  async settle(): Promise<void> {
    await Promise.all([...this.inflight])
  }

  /** Abort in-flight deliveries; their outcomes are still reported. */
  async stop(): Promise<void> {
    this.abort.abort()
    await this.settle()
  }

  private async deliver(directive: Directive): Promise<CommandOutcome> {
    const attempts = this.options.maxRetries + 1
    let lastDetail = "no acknowledgement"

    for (let attempt = 1; attempt <= attempts; attempt++) {
      if (this.abort.signal.aborted) {
        lastDetail = "delivery aborted"
        break
      }

      try {
        const ack = await this.sendWithTimeout(directive)
        if (ack.accepted) {
          return { status: "acked", directive }
        }
        lastDetail = `rejected: ${ack.detail ?? "no detail"}`
      } catch (err) {
        const classification = classifyError(err)
        lastDetail = classification.message
        if (!classification.retryable) {
          this.logger.warn("directive failed permanently", {
            commandId: directive.commandId,
            kind: directive.kind,
            attempt,
            error: lastDetail,
          })
          return {
            status: "failed",
            directive,
            error: new CommandTimeoutError(directive.commandId, attempt, lastDetail),
          }
        }
      }

      this.logger.debug("directive attempt failed", {
        commandId: directive.commandId,
        attempt,
        detail: lastDetail,
      })
    }

    return {
      status: "failed",
      directive,
      error: new CommandTimeoutError(directive.commandId, attempts, lastDetail),
    }
  }

  private async sendWithTimeout(directive: Directive) {
    const attemptAbort = new AbortController()
    const onStop = (): void => attemptAbort.abort()
    this.abort.signal.addEventListener("abort", onStop)

    let timer: ReturnType<typeof setTimeout> | undefined
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        attemptAbort.abort()
        reject(new Error(`ack timeout after ${String(this.options.ackTimeoutMs)} ms`))
      }, this.options.ackTimeoutMs)
    })

    try {
      return await Promise.race([this.transport.send(directive, attemptAbort.signal), timeout])
    } finally {
      clearTimeout(timer)
      this.abort.signal.removeEventListener("abort", onStop)
    }
  }
}
