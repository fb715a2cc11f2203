import { FleetEventSchema } from "@aether/shared/fleet"
import { z } from "zod"

const internalBase = {
  agentId: z.string().min(1),
  timestamp: z.number().int().nonnegative(),
}

/**
 * Messages an actor posts to itself. They are logged to history next to
 * fleet events so that replay reproduces their effect on state.
 */
export const InternalMessageSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("ValidateMission"), ...internalBase, missionId: z.string() }),
  z.object({
    kind: z.literal("CommandAcked"),
    ...internalBase,
    missionId: z.string().nullable(),
    commandId: z.string(),
  }),
  z.object({
    kind: z.literal("CommandFailed"),
    ...internalBase,
    missionId: z.string().nullable(),
    commandId: z.string(),
    detail: z.string(),
  }),
  z.object({ kind: z.literal("GraceExpired"), ...internalBase, missionId: z.string() }),
  z.object({ kind: z.literal("DisarmTimeout"), ...internalBase }),
])

export type InternalMessage = z.infer<typeof InternalMessageSchema>

export const ActorMessageSchema = z.union([FleetEventSchema, InternalMessageSchema])

export type ActorMessage = z.infer<typeof ActorMessageSchema>
