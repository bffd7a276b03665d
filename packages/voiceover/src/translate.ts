import { GoogleGenAI } from '@google/genai';
import type { Translator } from '@threadcast/shared';

export interface GeminiTranslatorOptions {
  apiKey: string;
  model?: string;
}

/** Translation through Gemini, used when narration should not be in the thread's language. */
export class GeminiTranslator implements Translator {
  private client: GoogleGenAI;
  private model: string;

  constructor(options: GeminiTranslatorOptions) {
    this.client = new GoogleGenAI({ apiKey: options.apiKey });
    this.model = options.model ?? 'gemini-2.5-flash';
  }

  async translate(text: string, targetLanguage: string): Promise<string> {
    const response = await this.client.models.generateContent({
      model: this.model,
      contents: `Translate the following text to the language with code "${targetLanguage}". Reply with the translation only, no quotes or notes.\n\n${text}`,
    });

    const translated = response.text?.trim();
    if (!translated) {
      throw new Error('Gemini returned an empty translation');
    }
    return translated;
  }
}
