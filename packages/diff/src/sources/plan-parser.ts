import { isLosslessNumber, parse as parseLosslessJson } from 'lossless-json';
import { z } from 'zod';

import type { PlanDocument, ResourceChange } from '../domain/plan-types.js';
import { toAttributeMap, type NumberTextReader } from '../domain/plan-value.js';

export class PlanParseError extends Error {
  override readonly name = 'PlanParseError';
  readonly path: readonly (string | number)[];

  constructor(message: string, path: readonly (string | number)[] = []) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.path = path;
  }
}

// lossless-json decodes numbers as objects; only JSON objects may pass as maps.
const isPlainObject = (value: unknown): boolean =>
  typeof value === 'object' &&
  value !== null &&
  !Array.isArray(value) &&
  !isLosslessNumber(value) &&
  Object.getPrototypeOf(value) === Object.prototype;

const jsonObject = <Schema extends z.ZodTypeAny>(schema: Schema, allowNull = false) =>
  z
    .unknown()
    .superRefine((value, context) => {
      if (!(isPlainObject(value) || (allowNull && value === null))) {
        context.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Expected object, received ${describeJsonValue(value)}`,
          fatal: true,
        });
      }
    })
    .pipe(schema);

const attributeMapSchema = jsonObject(
  z.record(z.string(), z.unknown()).nullable(),
  true,
).optional();

const resourceChangeSchema = z
  .object({
    address: z.string(),
    type: z.string(),
    name: z.string(),
    change: z
      .object({
        actions: z.array(z.string()),
        before: attributeMapSchema,
        after: attributeMapSchema,
        after_unknown: attributeMapSchema,
      })
      .passthrough(),
  })
  .passthrough();

const planDocumentSchema = jsonObject(
  z
    .object({
      format_version: z.string().optional(),
      terraform_version: z.string().optional(),
      resource_changes: z.array(resourceChangeSchema).optional(),
    })
    .passthrough(),
);

type RawResourceChange = z.infer<typeof resourceChangeSchema>;

const readLosslessNumber: NumberTextReader = (raw) =>
  isLosslessNumber(raw) ? raw.value : undefined;

/**
 * Parses a plan document in the JSON form written by `terraform show -json`.
 * Numbers keep their source text. Any syntax or shape problem rejects the whole document.
 *
 * @param text - UTF-8 JSON text of the plan.
 * @returns The plan with every resource change converted to plan values.
 * @throws {PlanParseError} When the text is not valid JSON or lacks the expected structure.
 */
export function parsePlanDocument(text: string): PlanDocument {
  let decoded: unknown;
  try {
    decoded = parseLosslessJson(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PlanParseError(`Plan is not valid JSON: ${reason}`);
  }

  const result = planDocumentSchema.safeParse(decoded);
  if (!result.success) {
    const [issue] = result.error.issues;
    const issuePath = issue?.path ?? [];
    const location = issuePath.length === 0 ? 'document root' : formatIssuePath(issuePath);
    throw new PlanParseError(
      `Invalid plan document at ${location}: ${issue?.message ?? 'unexpected structure'}`,
      issuePath,
    );
  }

  const document = result.data;
  return {
    ...(document.format_version === undefined ? {} : { formatVersion: document.format_version }),
    ...(document.terraform_version === undefined
      ? {}
      : { terraformVersion: document.terraform_version }),
    resourceChanges: (document.resource_changes ?? []).map((entry) => toResourceChange(entry)),
  };
}

function toResourceChange(entry: RawResourceChange): ResourceChange {
  return {
    address: entry.address,
    type: entry.type,
    name: entry.name,
    actions: entry.change.actions,
    before: toAttributeMap(entry.change.before, readLosslessNumber),
    after: toAttributeMap(entry.change.after, readLosslessNumber),
    afterUnknown: toAttributeMap(entry.change.after_unknown, readLosslessNumber),
  };
}

function describeJsonValue(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  if (isLosslessNumber(value)) {
    return 'number';
  }
  return typeof value;
}

function formatIssuePath(segments: readonly (string | number)[]): string {
  let formatted = '';
  for (const segment of segments) {
    if (typeof segment === 'number') {
      formatted += `[${segment}]`;
    } else {
      formatted += formatted.length === 0 ? segment : `.${segment}`;
    }
  }
  return formatted;
}
