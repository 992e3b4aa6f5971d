import { z } from 'zod';
import { FILES } from './chess.js';
import type { BoardState, Color, GameStatus, PromotionKind } from './chess.js';

const REQUIRED = 'This field is required.';

const squareField = z
  .string({ required_error: REQUIRED, invalid_type_error: 'Enter a square in the format e2.' })
  .trim()
  .superRefine((value, ctx) => {
    if (value.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: REQUIRED });
      return;
    }
    if (value.length !== 2) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Enter a square in the format e2.' });
      return;
    }
    const file = value[0].toLowerCase();
    const rank = Number(value[1]);
    if (!FILES.some((f) => f === file)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'File must be a letter from a to h.' });
      return;
    }
    if (!Number.isInteger(rank) || rank < 1 || rank > 8) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Rank must be a number from 1 to 8.' });
    }
  })
  .transform((value) => value.toLowerCase());

const PROMOTION_ALIASES: Record<string, PromotionKind> = {
  q: 'queen',
  r: 'rook',
  b: 'bishop',
  n: 'knight',
  queen: 'queen',
  rook: 'rook',
  bishop: 'bishop',
  knight: 'knight'
};

const promotionField = z.preprocess(
  (value) => {
    if (value === null || value === undefined) return undefined;
    if (typeof value !== 'string') return value;
    const normalized = value.trim().toLowerCase();
    if (normalized === '') return undefined;
    return PROMOTION_ALIASES[normalized] ?? normalized;
  },
  z
    .enum(['queen', 'rook', 'bishop', 'knight'], {
      errorMap: () => ({ message: 'Choose a queen, rook, bishop or knight.' })
    })
    .optional()
);

/**
 * Move submission as posted by the board form or the JSON API.
 * Squares are trimmed and lower-cased; an empty promotion select means "none".
 */
export const moveRequestSchema = z.object({
  source: squareField,
  destination: squareField,
  promotion: promotionField
});

export type MoveRequest = z.infer<typeof moveRequestSchema>;

export type MoveRequestField = keyof MoveRequest;

export type MoveFieldErrors = Partial<Record<MoveRequestField, string[]>>;

export type MoveRequestParseResult =
  | { ok: true; request: MoveRequest }
  | { ok: false; message: string; fieldErrors: MoveFieldErrors };

export function parseMoveRequest(input: unknown): MoveRequestParseResult {
  const result = moveRequestSchema.safeParse(input);
  if (result.success) {
    return { ok: true, request: result.data };
  }

  const flat = result.error.flatten();
  return {
    ok: false,
    message: flat.formErrors[0] ?? 'Please correct the errors below.',
    fieldErrors: flat.fieldErrors
  };
}

export type MoveValidationError =
  | { kind: 'NotAuthenticated'; message: string }
  | { kind: 'MalformedRequest'; message: string; fieldErrors: MoveFieldErrors }
  | { kind: 'EmptySource'; message: string }
  | { kind: 'OutOfTurn'; message: string; turn: Color }
  | { kind: 'IllegalDestination'; message: string }
  | { kind: 'GameOver'; message: string; status: GameStatus }
  | { kind: 'ConcurrentModification'; message: string };

export type MoveValidationErrorKind = MoveValidationError['kind'];

export type MoveOutcome =
  | { ok: true; board: BoardState }
  | { ok: false; error: MoveValidationError; board: BoardState | null };
