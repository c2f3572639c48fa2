/**
 * Shared Zod schemas used across modules.
 */

import { z } from 'zod'

/** Whole seconds since the Unix epoch. */
export const EpochSecondsSchema = z.number().int()

/** Elapsed seconds; fractional values allowed. */
export const DurationSecondsSchema = z.number().finite()

export const FilePathSchema = z.string().min(1, 'File path cannot be empty')

export const ShutdownKindSchema = z.enum(['graceful', 'ungraceful'])
export type ShutdownKind = z.infer<typeof ShutdownKindSchema>
