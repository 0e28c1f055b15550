import { Type, type Schema } from '@google/genai';
import { z } from 'zod';
import { cleanJson } from '../ai';
import { create, ErrorCodes, toError } from '../utils/error';

export const ClinicalInsightSchema = z.object({
  summary: z.string().describe('Brief summary of the medical transcription'),
  key_findings: z.array(z.string()).describe('Key medical findings from the transcription'),
  medical_terms: z.array(z.string()).describe('Important medical terminology used'),
  recommendations: z
    .array(z.string())
    .describe('Any recommendations or follow-up actions mentioned'),
  specialty_context: z.string().describe('How this fits into the medical specialty context'),
});

export type ClinicalInsight = z.infer<typeof ClinicalInsightSchema>;

export const CLINICAL_INSIGHT_RESPONSE_SCHEMA: Schema = {
  type: Type.OBJECT,
  properties: {
    summary: { type: Type.STRING },
    key_findings: { type: Type.ARRAY, items: { type: Type.STRING } },
    medical_terms: { type: Type.ARRAY, items: { type: Type.STRING } },
    recommendations: { type: Type.ARRAY, items: { type: Type.STRING } },
    specialty_context: { type: Type.STRING },
  },
  required: ['summary', 'key_findings', 'medical_terms', 'recommendations', 'specialty_context'],
};

export const parseClinicalInsight = (text: string): ClinicalInsight => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(cleanJson(text));
  } catch (err) {
    throw create(ErrorCodes.INSIGHT_PARSE_ERROR, {
      customMessage: `Model response is not valid JSON: ${toError(err).message}`,
      originalError: toError(err),
    });
  }

  const result = ClinicalInsightSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw create(ErrorCodes.INSIGHT_PARSE_ERROR, {
      customMessage: `Model response does not match the clinical insight schema: ${issues}`,
    });
  }
  return result.data;
};
