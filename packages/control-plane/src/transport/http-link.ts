/**
 * HTTP transport link: POSTs each directive to the vehicle gateway and
 * reads the acknowledgement from the response body.
 *
 * POST {baseUrl}/agents/{agentId}/directives  ->  { accepted, detail? }
 */

import type { Directive, DirectiveAck } from "@aether/shared/fleet"
import { z } from "zod"

import type { TransportLink } from "../fleet/collaborators.js"
import { TransportHttpError } from "./error-classifier.js"

const AckBodySchema = z.object({
  accepted: z.boolean(),
  detail: z.string().optional(),
})

export class HttpTransportLink implements TransportLink {
  private readonly baseUrl: string
  private readonly fetchFn: typeof fetch

  constructor(baseUrl: string, fetchFn: typeof fetch = fetch) {
    this.baseUrl = baseUrl.replace(/\/+$/, "")
    this.fetchFn = fetchFn
  }

  async send(directive: Directive, signal?: AbortSignal): Promise<DirectiveAck> {
    const response = await this.fetchFn(
      `${this.baseUrl}/agents/${encodeURIComponent(directive.agentId)}/directives`,
      {
        method: "POST",
        headers: { "content-type": "application/json", "idempotency-key": directive.commandId },
        body: JSON.stringify(directive),
        signal,
      },
    )

    if (!response.ok) {
      throw new TransportHttpError(response.status, await response.text())
    }

    const body = AckBodySchema.parse(await response.json())
    return { commandId: directive.commandId, accepted: body.accepted, detail: body.detail }
  }
}

/**
 * Acknowledges every directive locally. Used when no gateway is
 * configured, e.g. when telemetry is replayed from a log.
 */
export class LoopbackTransportLink implements TransportLink {
  send(directive: Directive): Promise<DirectiveAck> {
    return Promise.resolve({ commandId: directive.commandId, accepted: true })
  }
}
