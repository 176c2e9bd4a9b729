import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { ConfigurationInvalidError, type InvalidField } from './ReportError.js';
import { DEFAULT_CANDIDATE_DELIMITERS, isUsableDelimiter } from './Delimiter.js';

/** Options accepted by a report. Every field has a default. */
export const ReportConfigSchema = Type.Object(
  {
    /** Delimiter placed between cells on the first line of each record. */
    outputDelimiter: Type.String({ minLength: 1, default: '\t' }),
    /** Skip detection and parse the input with this delimiter. */
    inputDelimiter: Type.Optional(Type.String({ minLength: 1 })),
    candidateDelimiters: Type.Array(Type.String({ minLength: 1 }), {
      minItems: 1,
      default: [...DEFAULT_CANDIDATE_DELIMITERS],
    }),
    batchSize: Type.Integer({ minimum: 1, default: 1000 }),
    minColumnWidth: Type.Integer({ minimum: 1, default: 15 }),
    maxColumnWidth: Type.Integer({ minimum: 1, default: 30 }),
    percentile: Type.Number({ minimum: 0, maximum: 1, default: 0.9 }),
    /** Characters read from the start of the input to detect its delimiter. */
    sampleSize: Type.Integer({ minimum: 1, default: 1024 }),
    /** `skip` drops rows with too few fields, `pad` fills them with empty cells. */
    shortRows: Type.Union([Type.Literal('skip'), Type.Literal('pad')], { default: 'skip' }),
  },
  { additionalProperties: false },
);

export type ReportConfig = Static<typeof ReportConfigSchema>;

export type ReportOptions = Partial<ReportConfig>;

/**
 * Apply defaults to `options` and validate the result.
 *
 * @throws ConfigurationInvalidError listing every rejected field.
 */
export function resolveReportConfig(options: ReportOptions = {}): ReportConfig {
  const candidate = Value.Default(ReportConfigSchema, Value.Clone(options));

  if (!Value.Check(ReportConfigSchema, candidate)) {
    const fields = [...Value.Errors(ReportConfigSchema, candidate)].map((error) => ({
      path: error.path,
      message: error.message,
    }));
    throw new ConfigurationInvalidError('Invalid report configuration', fields);
  }

  const fields: InvalidField[] = [];

  if (!isUsableDelimiter(candidate.outputDelimiter)) {
    fields.push({ path: '/outputDelimiter', message: 'Expected a single character other than a line break or quote' });
  }
  if (candidate.inputDelimiter !== undefined && !isUsableDelimiter(candidate.inputDelimiter)) {
    fields.push({ path: '/inputDelimiter', message: 'Expected a single character other than a line break or quote' });
  }
  candidate.candidateDelimiters.forEach((delimiter, i) => {
    if (!isUsableDelimiter(delimiter)) {
      fields.push({ path: `/candidateDelimiters/${String(i)}`, message: 'Expected a single character' });
    }
  });
  if (candidate.maxColumnWidth < candidate.minColumnWidth) {
    fields.push({ path: '/maxColumnWidth', message: 'Must be greater than or equal to minColumnWidth' });
  }

  if (fields.length > 0) {
    throw new ConfigurationInvalidError('Invalid report configuration', fields);
  }

  return candidate;
}
