import { readFileSync } from 'node:fs';
import { z } from 'zod';
import {
  AGENT_NAMES,
  type AgentName,
  type AnalysisOptions,
  type Analyst,
  type DocumentRecord,
  type JsonObject,
  type JsonValue,
  type SessionContext
} from './types.js';

const DEFAULT_TEMPLATES_URL = new URL('../data/analyst-templates.json', import.meta.url);

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema)
  ])
);

// Names the result field an option is written to, and its value when the caller gives none.
const OptionFieldSchema = z.object({
  field: z.string().min(1),
  default: z.string().optional()
});

const AnalystTemplateSchema = z.object({
  agent: z.enum(AGENT_NAMES),
  title: z.string().min(1),
  // relevant: only documents mentioning the subject; session: everything stored
  scope: z.enum(['relevant', 'session']),
  fields: z.record(JsonValueSchema),
  options: z.object({
    focus: OptionFieldSchema.optional(),
    stage: OptionFieldSchema.optional()
  }).default({}),
  recommendation: z.string()
});

export type AnalystTemplate = z.infer<typeof AnalystTemplateSchema>;

const AnalystTemplatesSchema = z
  .array(AnalystTemplateSchema)
  .superRefine((templates, ctx) => {
    for (const agent of AGENT_NAMES) {
      const count = templates.filter(t => t.agent === agent).length;
      if (count !== 1) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Expected exactly one template for ${agent}, found ${count}`
        });
      }
    }
  });

export function parseAnalystTemplates(raw: unknown): AnalystTemplate[] {
  const templates = AnalystTemplatesSchema.parse(raw);
  return [...templates].sort((a, b) => AGENT_NAMES.indexOf(a.agent) - AGENT_NAMES.indexOf(b.agent));
}

export function loadAnalystTemplates(source: URL | string = DEFAULT_TEMPLATES_URL): AnalystTemplate[] {
  const raw: unknown = JSON.parse(readFileSync(source, 'utf-8'));
  return parseAnalystTemplates(raw);
}

export function mentionsSubject(doc: DocumentRecord, subject: string): boolean {
  const needle = subject.trim().toLowerCase();
  if (needle === '') return false;
  return [doc.kind, doc.content, JSON.stringify(doc.metadata)]
    .some(text => text.toLowerCase().includes(needle));
}

export class TemplateAnalyst implements Analyst {
  readonly name: AgentName;
  readonly title: string;

  constructor(private readonly template: AnalystTemplate) {
    this.name = template.agent;
    this.title = template.title;
  }

  analyze(subject: string, context: SessionContext, options: AnalysisOptions = {}): JsonObject {
    const { scope, fields, recommendation } = this.template;

    const documents = scope === 'relevant'
      ? context.documents.filter(doc => mentionsSubject(doc, subject))
      : context.documents;

    const result: JsonObject = {
      status: 'success',
      agent: this.title,
      startup_name: subject,
      documents_analyzed: documents.length,
      document_types: documents.map(doc => doc.kind)
    };

    if (scope === 'session') {
      result.analyses_completed = Object.keys(context.analyses);
    }

    return { ...result, ...structuredClone(fields), ...this.optionFields(options), recommendation };
  }

  private optionFields(options: AnalysisOptions): JsonObject {
    const rendered: JsonObject = {};
    for (const key of ['focus', 'stage'] as const) {
      const spec = this.template.options[key];
      const value = options[key]?.trim() || spec?.default;
      if (spec && value) rendered[spec.field] = value;
    }
    return rendered;
  }
}

/** The eight template analysts, in pipeline order. */
export function createDefaultAnalysts(templates: AnalystTemplate[] = loadAnalystTemplates()): Analyst[] {
  return templates.map(template => new TemplateAnalyst(template));
}
