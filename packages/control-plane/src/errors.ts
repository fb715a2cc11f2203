/**
 * Error classes for lookup and programming failures.
 *
 * Expected outcomes of signals (Busy, Unreachable, ConstraintViolation, ...)
 * are discriminated-union results, not exceptions.
 */

import type { ZodIssue } from "zod"

export class UnknownAgentError extends Error {
  readonly agentId: string

  constructor(agentId: string) {
    super(`Unknown agent: ${agentId}`)
    this.name = "UnknownAgentError"
    this.agentId = agentId
  }
}

export class AgentAlreadyEnrolledError extends Error {
  readonly agentId: string

  constructor(agentId: string) {
    super(`Agent already enrolled: ${agentId}`)
    this.name = "AgentAlreadyEnrolledError"
    this.agentId = agentId
  }
}

export class InvalidAgentIdError extends Error {
  readonly agentId: string

  constructor(agentId: string) {
    super(`Invalid agent id: ${agentId}`)
    this.name = "InvalidAgentIdError"
    this.agentId = agentId
  }
}

export class CommandTimeoutError extends Error {
  readonly commandId: string
  readonly attempts: number

  constructor(commandId: string, attempts: number, detail: string) {
    super(`Command ${commandId} not acknowledged after ${String(attempts)} attempt(s): ${detail}`)
    this.name = "CommandTimeoutError"
    this.commandId = commandId
    this.attempts = attempts
  }
}

export class EventValidationError extends Error {
  readonly issues: ZodIssue[]

  constructor(issues: ZodIssue[]) {
    super(`Invalid fleet event: ${issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ")}`)
    this.name = "EventValidationError"
    this.issues = issues
  }
}

export class EntityStoppedError extends Error {
  readonly agentId: string

  constructor(agentId: string) {
    super(`Entity actor for ${agentId} is stopped`)
    this.name = "EntityStoppedError"
    this.agentId = agentId
  }
}
