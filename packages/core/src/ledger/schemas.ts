/**
 * Zod schemas for the session ledger.
 */

import { z } from 'zod'
import {
  EpochSecondsSchema,
  DurationSecondsSchema,
  ShutdownKindSchema,
} from '../common/index.js'

/** Marks `shutdownEpoch` and `downtimeSeconds` of the session that is still running. */
export const OPEN_SENTINEL = -1

export const SessionRecordSchema = z.object({
  sequence: z.number().int().positive(),
  bootEpoch: EpochSecondsSchema,
  uptimeSeconds: DurationSecondsSchema,
  shutdownEpoch: EpochSecondsSchema,
  shutdownKind: ShutdownKindSchema,
  downtimeSeconds: DurationSecondsSchema,
  kernelLabel: z.string(),
})

export type SessionRecord = z.infer<typeof SessionRecordSchema>

export const NewSessionInputSchema = z.object({
  bootEpoch: EpochSecondsSchema,
  uptimeSeconds: DurationSecondsSchema.nonnegative(),
  shutdownKind: ShutdownKindSchema.default('ungraceful'),
  kernelLabel: z.string().default(''),
})

export type NewSessionInput = z.input<typeof NewSessionInputSchema>

/** Fields refreshed on every invocation while a session stays open. */
export const RefreshInputSchema = z.object({
  uptimeSeconds: DurationSecondsSchema.nonnegative(),
  shutdownKind: ShutdownKindSchema,
  kernelLabel: z.string(),
})

export type RefreshInput = z.infer<typeof RefreshInputSchema>

export const CloseInputSchema = z.object({
  shutdownEpoch: EpochSecondsSchema,
  downtimeSeconds: DurationSecondsSchema,
  shutdownKind: ShutdownKindSchema,
})

export type CloseInput = z.infer<typeof CloseInputSchema>

/** One reading of the host clock, taken as a single snapshot. */
export const ObservationSchema = z.object({
  bootEpoch: EpochSecondsSchema,
  uptimeSeconds: DurationSecondsSchema.nonnegative(),
  kernelLabel: z.string(),
})

export type Observation = z.infer<typeof ObservationSchema>

export function isOpen(record: SessionRecord): boolean {
  return record.shutdownEpoch === OPEN_SENTINEL
}
