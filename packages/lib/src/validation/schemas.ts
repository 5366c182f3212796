// packages/lib/src/validation/schemas.ts
import { z } from 'zod';
import { normalizeGameType } from '../gameRegistry.js';
import { checkDraw, mergeDraws } from '../lotto/draws.js';
import { DecodeError } from '../lotto/errors.js';
import { toFrequencyTable } from '../lotto/frequency.js';
import {
  ALL_POSITIONS,
  GAME_TYPES,
  REGULAR_POSITIONS,
  type DrawCollection,
  type FrequencyTable,
  type GameType,
  type OptimizedCombination,
  type Position,
  type RegularPosition,
  type SignificanceEntry,
  type SignificanceTable,
  type StatsArtifact,
} from '../lotto/types.js';

export const STATS_SCHEMA_VERSION = 2;

/* ===========================
   Draw records
   =========================== */

export const gameTypeSchema = z.preprocess(
  (v: unknown) => normalizeGameType(v) ?? v,
  z.enum(GAME_TYPES),
);

const ball = z.number().int();

export const drawSchema = z
  .object({
    date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD'),
    numbers: z.tuple([ball, ball, ball, ball, ball]),
    specialBall: ball,
    type: gameTypeSchema,
  })
  .superRefine((draw, ctx) => {
    for (const issue of checkDraw(draw, draw.type)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [issue.field], message: issue.message });
    }
  });

export type DrawJson = {
  date: string;
  numbers: number[];
  specialBall: number;
  type: GameType;
};

function issueList(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
}

/** Parse a persisted draw history; any bad record rejects the whole file. */
export function decodeDraws(json: unknown, game: GameType): DrawCollection {
  const parsed = z.array(drawSchema).safeParse(json);
  if (!parsed.success) throw new DecodeError(`${game} draws`, issueList(parsed.error));
  const wrongGame = parsed.data.filter((d) => d.type !== game);
  if (wrongGame.length) {
    throw new DecodeError(
      `${game} draws`,
      wrongGame.map((d) => `${d.date}: type ${d.type}`),
    );
  }
  const seen = new Set<string>();
  const repeated = new Set<string>();
  for (const d of parsed.data) {
    if (seen.has(d.date)) repeated.add(d.date);
    seen.add(d.date);
  }
  if (repeated.size) {
    throw new DecodeError(
      `${game} draws`,
      [...repeated].map((date) => `${date}: duplicate date`),
    );
  }
  return mergeDraws(game, parsed.data);
}

export function encodeDraws(draws: DrawCollection): DrawJson[] {
  return draws.map((d) => ({ date: d.date, numbers: [...d.numbers], specialBall: d.specialBall, type: d.type }));
}

/* ===========================
   Stats document (wire shape)
   =========================== */

const countRecord = z.record(z.string().regex(/^\d+$/), z.number().int().nonnegative());

const significanceEntrySchema = z.object({
  observed: z.number().int().nonnegative(),
  expected: z.number(),
  residual: z.number(),
  significant: z.boolean(),
});
const significanceRecord = z.record(z.string().regex(/^\d+$/), significanceEntrySchema);

const optimizedSchema = z.tuple([ball, ball, ball, ball, ball, ball]).nullable();

export const statsDocumentSchema = z.object({
  schemaVersion: z.literal(STATS_SCHEMA_VERSION),
  type: z.enum(GAME_TYPES),
  totalDraws: z.number().int().nonnegative(),
  frequency: countRecord,
  frequencyAtPosition: z.object({
    '0': countRecord,
    '1': countRecord,
    '2': countRecord,
    '3': countRecord,
    '4': countRecord,
    '5': countRecord,
  }),
  specialBallFrequency: countRecord,
  regularNumbers: significanceRecord,
  specialBallNumbers: significanceRecord,
  byPosition: z.object({
    '0': significanceRecord,
    '1': significanceRecord,
    '2': significanceRecord,
    '3': significanceRecord,
    '4': significanceRecord,
  }),
  optimizedByPosition: optimizedSchema,
  optimizedByGeneralFrequency: optimizedSchema,
});

export type StatsDocument = z.infer<typeof statsDocumentSchema>;
type CountRecord = Record<string, number>;
type SignificanceRecord = Record<string, SignificanceEntry>;
type WirePick = [number, number, number, number, number, number];

function countsToRecord(table: FrequencyTable): CountRecord {
  return Object.fromEntries([...table].map(([n, c]) => [String(n), c]));
}

function significanceToRecord(table: SignificanceTable): SignificanceRecord {
  return Object.fromEntries([...table].map(([n, e]) => [String(n), { ...e }]));
}

function recordToCounts(rec: CountRecord): FrequencyTable {
  return toFrequencyTable(Object.entries(rec).map(([k, c]): [number, number] => [Number(k), c]));
}

function recordToSignificance(rec: SignificanceRecord): SignificanceTable {
  return new Map(
    Object.entries(rec)
      .map(([k, e]): [number, SignificanceEntry] => [Number(k), e])
      .sort((a, b) => a[0] - b[0]),
  );
}

function pickToWire(pick: OptimizedCombination | null): WirePick | null {
  return pick ? [pick[0], pick[1], pick[2], pick[3], pick[4], pick[5]] : null;
}

/** In-memory artifact → serialization contract (numeric keys as strings). */
export function encodeStats(artifact: StatsArtifact): StatsDocument {
  const atPosition = (p: Position): CountRecord => countsToRecord(artifact.frequencyAtPosition.get(p) ?? new Map());
  const sigAt = (p: RegularPosition): SignificanceRecord => significanceToRecord(artifact.byPosition.get(p) ?? new Map());
  return {
    schemaVersion: STATS_SCHEMA_VERSION,
    type: artifact.type,
    totalDraws: artifact.totalDraws,
    frequency: countsToRecord(artifact.frequency),
    frequencyAtPosition: {
      '0': atPosition(0),
      '1': atPosition(1),
      '2': atPosition(2),
      '3': atPosition(3),
      '4': atPosition(4),
      '5': atPosition(5),
    },
    specialBallFrequency: countsToRecord(artifact.specialBallFrequency),
    regularNumbers: significanceToRecord(artifact.regularNumbers),
    specialBallNumbers: significanceToRecord(artifact.specialBallNumbers),
    byPosition: { '0': sigAt(0), '1': sigAt(1), '2': sigAt(2), '3': sigAt(3), '4': sigAt(4) },
    optimizedByPosition: pickToWire(artifact.optimizedByPosition),
    optimizedByGeneralFrequency: pickToWire(artifact.optimizedByGeneralFrequency),
  };
}

/**
 * Strict decode. Other schema versions (e.g. files that only carry
 * optimizedWinningNumber) are rejected. Tables come back in canonical order.
 */
export function decodeStats(json: unknown): StatsArtifact {
  const parsed = statsDocumentSchema.safeParse(json);
  if (!parsed.success) throw new DecodeError('stats document', issueList(parsed.error));
  const doc = parsed.data;

  return {
    type: doc.type,
    totalDraws: doc.totalDraws,
    frequency: recordToCounts(doc.frequency),
    frequencyAtPosition: new Map(
      ALL_POSITIONS.map((p): [Position, FrequencyTable] => [p, recordToCounts(doc.frequencyAtPosition[`${p}` as const])]),
    ),
    specialBallFrequency: recordToCounts(doc.specialBallFrequency),
    regularNumbers: recordToSignificance(doc.regularNumbers),
    specialBallNumbers: recordToSignificance(doc.specialBallNumbers),
    byPosition: new Map(
      REGULAR_POSITIONS.map((p): [RegularPosition, SignificanceTable] => [p, recordToSignificance(doc.byPosition[`${p}` as const])]),
    ),
    optimizedByPosition: doc.optimizedByPosition,
    optimizedByGeneralFrequency: doc.optimizedByGeneralFrequency,
  };
}

/* ===========================
   Job configuration
   =========================== */

const nonEmpty = z
  .string()
  .trim()
  .transform((s) => (s === '' ? undefined : s));

export const envSchema = z.object({
  DATA_DIR: nonEmpty.optional().transform((v) => v ?? 'data'),
  GCS_BUCKET: nonEmpty.optional(),
  DATA_BUCKET: nonEmpty.optional(),
  LOTTERY_BASE_URL: z.string().url().default('https://www.lottery.net'),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
  JSON_CACHE_CONTROL: z.string().default('public, max-age=300, must-revalidate'),
  LOG_LEVEL: z.preprocess(
    (v: unknown) => {
      if (typeof v !== 'string') return v;
      const level = v.trim().toLowerCase();
      return level === 'warning' ? 'warn' : level;
    },
    z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  ),
});

export type EnvConfig = z.infer<typeof envSchema>;
