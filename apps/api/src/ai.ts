import { GoogleGenAI, type Schema } from '@google/genai';

export type ModelSettings = {
  apiKey: string;
  modelName: string;
  temperature: number;
};

/** Submits prompt text and resolves with the raw completion text. */
export interface CompletionModel {
  complete(prompt: string): Promise<string>;
}

export type ModelFactory = (settings: ModelSettings) => CompletionModel;

export const cleanJson = (text: string) => text.replace(/```json/g, '').replace(/```/g, '').trim();

export class GeminiCompletionModel implements CompletionModel {
  private readonly ai: GoogleGenAI;

  constructor(
    private readonly settings: ModelSettings,
    private readonly responseSchema?: Schema
  ) {
    this.ai = new GoogleGenAI({ apiKey: settings.apiKey });
  }

  public async complete(prompt: string): Promise<string> {
    const response = await this.ai.models.generateContent({
      model: this.settings.modelName,
      contents: prompt,
      config: {
        temperature: this.settings.temperature,
        responseMimeType: 'application/json',
        responseSchema: this.responseSchema
      }
    });
    return response.text || '';
  }
}
