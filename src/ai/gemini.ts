/**
 * Gemini backend for exclude-pattern generation.
 */

import { GoogleGenerativeAI, type EnhancedGenerateContentResponse } from '@google/generative-ai';
import { GenerationRefusedError, type GenerationBackend, type GenerationRequest } from './backend.js';

export const DEFAULT_GEMINI_MODEL = 'gemini-2.0-flash';
export const DEFAULT_TIMEOUT_MS = 120_000;

// Finish reasons that mean the model stopped on policy grounds rather than finishing
const REFUSAL_FINISH_REASONS = new Set<string>([
    'SAFETY',
    'RECITATION',
    'BLOCKLIST',
    'PROHIBITED_CONTENT',
    'SPII',
]);

export interface GeminiBackendOptions {
    apiKey: string;
    model?: string;
    /** Request timeout in milliseconds (default: 120000 = 2 min) */
    timeoutMs?: number;
    verbose?: boolean;
}

export class GeminiBackend implements GenerationBackend {
    readonly name: string;
    private client: GoogleGenerativeAI | null = null;
    private readonly model: string;

    constructor(private readonly options: GeminiBackendOptions) {
        this.model = options.model || DEFAULT_GEMINI_MODEL;
        this.name = `Gemini (${this.model})`;
    }

    configure(): void {
        const apiKey = this.options.apiKey.trim();
        if (!apiKey) {
            throw new Error(
                'Gemini API key is required.\n' +
                'Provide it via --api-key or set GEMINI_API_KEY in the environment or .env.'
            );
        }
        this.client = new GoogleGenerativeAI(apiKey);
    }

    async generate(request: GenerationRequest): Promise<string> {
        if (!this.client) this.configure();
        const client = this.client;
        if (!client) {
            throw new Error('Gemini client is not configured');
        }

        const timeoutMs = this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
        const model = client.getGenerativeModel(
            {
                model: this.model,
                systemInstruction: request.system,
                generationConfig: {
                    temperature: request.temperature,
                    maxOutputTokens: request.maxOutputTokens,
                },
            },
            { timeout: timeoutMs }
        );

        if (this.options.verbose) {
            console.log(`  Calling ${this.model}...`);
            console.log(`  Prompt size: ${(request.prompt.length / 1024).toFixed(1)}KB`);
            console.log(`  Timeout: ${timeoutMs / 1000}s`);
        }

        const result = await model.generateContent(request.prompt);
        assertNotRefused(result.response);

        if (this.options.verbose) console.log(`  Response received`);

        return result.response.text().trim();
    }
}

/**
 * Throw GenerationRefusedError when the prompt was blocked or the answer was cut off
 * for safety reasons.
 */
export function assertNotRefused(response: EnhancedGenerateContentResponse): void {
    const blockReason = response.promptFeedback?.blockReason;
    if (blockReason) {
        throw new GenerationRefusedError(`Gemini blocked the prompt (reason: ${blockReason})`, blockReason);
    }

    const finishReason = response.candidates?.[0]?.finishReason;
    if (finishReason && REFUSAL_FINISH_REASONS.has(finishReason)) {
        throw new GenerationRefusedError(`Gemini stopped the response (finish reason: ${finishReason})`, finishReason);
    }
}
