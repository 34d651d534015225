/**
 * Case battery schema and harness result types.
 */

import { Type, type Static } from '@sinclair/typebox';
import type { Realization } from '../matcher/types.js';

export const CaseTupleSchema = Type.Tuple([Type.String(), Type.String(), Type.Boolean()]);

export const CaseObjectSchema = Type.Object({
  subject: Type.String(),
  pattern: Type.String(),
  expected: Type.Boolean(),
  note: Type.Optional(Type.String()),
});

export const ElementModeSchema = Type.Union([Type.Literal('units'), Type.Literal('codepoints')]);

export const BatteryFileSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  title: Type.String({ minLength: 1 }),
  // Free text for readers of the file; accepted but not loaded.
  description: Type.Optional(Type.String()),
  repetitions: Type.Optional(Type.Integer({ minimum: 1 })),
  elements: Type.Optional(ElementModeSchema),
  cases: Type.Array(Type.Union([CaseTupleSchema, CaseObjectSchema])),
});

export type BatteryFile = Static<typeof BatteryFileSchema>;

/** `units` reads strings per UTF-16 code unit, `codepoints` splits them with Array.from first. */
export type ElementMode = Static<typeof ElementModeSchema>;

export interface MatchCase {
  subject: string;
  pattern: string;
  expected: boolean;
  note: string | null;
}

export interface Battery {
  name: string;
  title: string;
  repetitions: number;
  elements: ElementMode;
  cases: MatchCase[];
}

export interface CaseFailure {
  subject: string;
  pattern: string;
  expected: boolean;
  actual: boolean;
  realization: Realization;
  note: string | null;
}

export interface BatteryResult {
  name: string;
  title: string;
  passed: boolean;
  cases: number;
  repetitions: number;
  failures: CaseFailure[];
  /** Milliseconds per realization, summed over all repetitions. */
  durations: Partial<Record<Realization, number>>;
}

export interface Divergence {
  pattern: string;
  subject: string;
  results: Partial<Record<Realization, boolean>>;
}

export interface FuzzReport {
  iterations: number;
  seed: number;
  matched: number;
  divergences: Divergence[];
}

export interface HarnessReport {
  runId: string;
  batteries: BatteryResult[];
  fuzz: FuzzReport | null;
}
