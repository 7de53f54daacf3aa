import { GoogleGenerativeAI } from '@google/generative-ai';
import type { GenerativeModel } from '@google/generative-ai';
import type { DocumentPrompt, GenerationService } from '../types/services.js';

export interface GeminiSummarizerOptions {
  apiKey: string;
  model?: string;
  timeoutMs?: number;
}

export class GeminiSummarizer implements GenerationService {
  private genAI: GoogleGenerativeAI;
  private model: GenerativeModel;

  constructor(options: GeminiSummarizerOptions) {
    this.genAI = new GoogleGenerativeAI(options.apiKey);
    this.model = this.genAI.getGenerativeModel(
      {
        model: options.model ?? 'gemini-2.5-flash',
        // Low temperature for consistent summaries
        generationConfig: {
          temperature: 0.2,
          topP: 0.8,
        },
      },
      { timeout: options.timeoutMs ?? 120000 }
    );
  }

  async summarizeDocument({ document, mimeType, prompt }: DocumentPrompt): Promise<string> {
    const result = await this.model.generateContent([
      { inlineData: { mimeType, data: document.toString('base64') } },
      { text: prompt },
    ]);
    return result.response.text();
  }

  async generateText(prompt: string): Promise<string> {
    const result = await this.model.generateContent(prompt);
    return result.response.text();
  }
}
