export const CLINICAL_INSIGHT_SCHEMA_VERSION = 'clinical-insight/v1';

export const CLINICAL_INSIGHT_FORMAT_INSTRUCTIONS = `Respond with one JSON object and nothing else (schema ${CLINICAL_INSIGHT_SCHEMA_VERSION}).
The object must contain exactly these fields, all of them required:
- "summary" (string): Brief summary of the medical transcription
- "key_findings" (array of strings): Key medical findings from the transcription
- "medical_terms" (array of strings): Important medical terminology used
- "recommendations" (array of strings): Any recommendations or follow-up actions mentioned
- "specialty_context" (string): How this fits into the medical specialty context
Use an empty array when a list has nothing to report.`;

export const CLINICAL_INSIGHT_PROMPT = `You are an AI assistant for healthcare professionals. Analyze the following medical transcription and provide insights.

MEDICAL SPECIALTY: {specialty}

TRANSCRIPTION:
{transcription}

{format_instructions}
`;

const HOLE = /\{(\w+)\}/g;

/**
 * A prompt with `{name}` holes. Holes are filled in a single pass over the
 * template, so braces inside substituted values are never expanded.
 */
export class PromptTemplate<V extends string> {
  constructor(
    public readonly template: string,
    public readonly inputVariables: readonly V[],
    private readonly partials: Record<string, string> = {}
  ) {}

  public format(values: Record<V, string>): string {
    const filled: Record<string, string> = { ...this.partials, ...values };
    const missing = this.inputVariables.filter(name => filled[name] === undefined);
    if (missing.length) {
      throw new Error(`Missing prompt variables: ${missing.join(', ')}`);
    }
    return this.template.replace(HOLE, (hole, name: string) => filled[name] ?? hole);
  }
}

export type ClinicalInsightVariables = 'specialty' | 'transcription';

export const clinicalInsightPrompt = () =>
  new PromptTemplate<ClinicalInsightVariables>(CLINICAL_INSIGHT_PROMPT, ['specialty', 'transcription'], {
    format_instructions: CLINICAL_INSIGHT_FORMAT_INSTRUCTIONS,
  });
