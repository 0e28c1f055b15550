import { GeminiCompletionModel, type CompletionModel, type ModelFactory } from '../ai';
import { getConfig } from '../config';
import { create, ErrorCodes, isPipelineError, toError } from '../utils/error';
import { getLogger } from '../utils/logger';
import type { TranscriptionRecord } from '../types/schema';
import { clinicalInsightPrompt, type ClinicalInsightVariables, type PromptTemplate } from './prompt';
import { CLINICAL_INSIGHT_RESPONSE_SCHEMA, parseClinicalInsight, type ClinicalInsight } from './schema';

export type { ClinicalInsight } from './schema';

const logger = getLogger('InsightClient');

const UNKNOWN_SPECIALTY = 'Unknown';

export type InitializeOptions = {
  apiKey?: string;
  modelName?: string;
  temperature?: number;
};

type ReadyState = {
  model: CompletionModel;
  modelName: string;
  temperature: number;
  template: PromptTemplate<ClinicalInsightVariables>;
};

export const createGeminiModel: ModelFactory = settings =>
  new GeminiCompletionModel(settings, CLINICAL_INSIGHT_RESPONSE_SCHEMA);

/**
 * Turns one transcription record into a structured clinical insight with a
 * single model call. Starts uninitialized; `initialize` (or the first
 * `analyze`) binds the model and the prompt template.
 */
export class InsightClient {
  private ready: ReadyState | null = null;
  private readonly modelFactory: ModelFactory;

  constructor({ modelFactory = createGeminiModel }: { modelFactory?: ModelFactory } = {}) {
    this.modelFactory = modelFactory;
  }

  public isReady() {
    return this.ready !== null;
  }

  public getSettings() {
    if (!this.ready) return null;
    return { modelName: this.ready.modelName, temperature: this.ready.temperature };
  }

  public initialize(options: InitializeOptions = {}): void {
    this.ready = this.bind(options);
  }

  public async analyze(record: TranscriptionRecord): Promise<ClinicalInsight> {
    const ready = this.ready ?? (this.ready = this.bind());

    const specialty = record.medical_specialty || UNKNOWN_SPECIALTY;
    const transcription = typeof record.transcription === 'string' ? record.transcription : '';
    if (!transcription.trim()) {
      logger.error('Empty transcription text');
      throw create(ErrorCodes.EMPTY_TRANSCRIPTION);
    }

    const start = Date.now();
    logger.info(`Analyzing medical transcription (${specialty})`);
    const prompt = ready.template.format({ specialty, transcription });

    let raw: string;
    try {
      raw = await ready.model.complete(prompt);
    } catch (err) {
      logger.error(`Error calling model ${ready.modelName}: ${toError(err).message}`);
      if (isPipelineError(err)) throw err;
      throw create(ErrorCodes.MODEL_CALL_FAILED, { originalError: toError(err) });
    }

    try {
      const insight = parseClinicalInsight(raw);
      logger.info(`Transcription analyzed in ${((Date.now() - start) / 1000).toFixed(2)} seconds`);
      return insight;
    } catch (err) {
      logger.error(`Error parsing model response: ${toError(err).message}`);
      throw err;
    }
  }

  private bind(options: InitializeOptions = {}): ReadyState {
    const config = getConfig();
    const apiKey = options.apiKey || config.geminiApiKey;
    const modelName = options.modelName || config.geminiModel;
    const temperature = options.temperature ?? config.modelTemperature;

    if (!apiKey) {
      logger.error('No Gemini API key provided');
      throw create(ErrorCodes.MISSING_API_KEY);
    }

    const model = this.modelFactory({ apiKey, modelName, temperature });
    logger.info(`LLM initialized with model: ${modelName}, temperature: ${temperature}`);
    return { model, modelName, temperature, template: clinicalInsightPrompt() };
  }
}
