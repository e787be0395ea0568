import {
  GenerateContentResult,
  GenerationConfig,
  GenerativeModel,
  GoogleGenerativeAI,
  Tool,
} from '@google/generative-ai';
import type { CompletionOptions, LanguageModel, StructuredOutput } from '../types';
import { logger } from '../utils/logger';
import { withTimeout } from '../utils/timeout';
import { ConnectionDroppedError, ParseError, isConnectionDropped } from '../research/errors';

export interface GeminiServiceOptions {
  apiKey: string | undefined;
  defaultModel: string;
  timeoutMs: number;
}

const WEB_SEARCH_TOOLS: Tool[] = [{ googleSearchRetrieval: {} }];

/**
 * Language-model capability backed by Gemini. Plain completions return the
 * text; structured completions let the API enforce the response schema and
 * then check it with the contract's parser.
 */
export class GeminiService implements LanguageModel {
  private readonly client: GoogleGenerativeAI;

  constructor(private readonly options: GeminiServiceOptions) {
    if (!options.apiKey) {
      throw new Error('GOOGLE_GENERATIVE_AI_API_KEY not set in environment');
    }
    this.client = new GoogleGenerativeAI(options.apiKey);
  }

  private getModel(system: string, options: CompletionOptions, generationConfig: GenerationConfig): GenerativeModel {
    return this.client.getGenerativeModel({
      model: options.model ?? this.options.defaultModel,
      systemInstruction: system,
      tools: options.webSearch ? WEB_SEARCH_TOOLS : undefined,
      generationConfig: { temperature: 0, ...generationConfig },
    });
  }

  private async generate(model: GenerativeModel, user: string, options: CompletionOptions, operation: string) {
    let result: GenerateContentResult;
    try {
      result = await withTimeout(model.generateContent(user), options.timeoutMs ?? this.options.timeoutMs, operation);
    } catch (error) {
      if (isConnectionDropped(error)) {
        throw new ConnectionDroppedError(`${operation}: connection dropped`, error);
      }
      throw error;
    }
    return result.response.text();
  }

  async complete(system: string, user: string, options: CompletionOptions = {}): Promise<string> {
    const model = this.getModel(system, options, {});
    return this.generate(model, user, options, 'Gemini completion');
  }

  async completeStructured<T>(
    system: string,
    user: string,
    output: StructuredOutput<T>,
    options: CompletionOptions = {}
  ): Promise<T> {
    let input = user;
    if (options.webSearch) {
      // Search grounding and a response schema cannot share one request:
      // research first, then convert the findings under the schema.
      const findings = await this.complete(system, user, options);
      logger.debug(`Grounded findings for ${output.name} (${findings.length} chars)`);
      input = `${user}\n\nResearch findings:\n${findings}`;
    }

    const model = this.getModel(system, { ...options, webSearch: false }, {
      responseMimeType: 'application/json',
      responseSchema: output.responseSchema,
    });
    const text = await this.generate(model, input, options, `Gemini ${output.name}`);

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      throw new ParseError(`${output.name}: response is not valid JSON`, text);
    }

    const parsed = output.parser.safeParse(json);
    if (!parsed.success) {
      throw new ParseError(`${output.name}: ${parsed.error.issues.map(issue => issue.message).join('; ')}`, text);
    }
    return parsed.data;
  }
}
