/**
 * Generation backend contract.
 *
 * The pattern generator only ever talks to this interface; GeminiBackend is the
 * production implementation and tests substitute in-process fakes.
 */

export interface GenerationRequest {
    /** Fixed system instruction */
    system: string;
    /** Per-call user prompt */
    prompt: string;
    temperature: number;
    maxOutputTokens: number;
}

export interface GenerationBackend {
    /** Human-readable backend name used in log lines */
    readonly name: string;
    /** Prepare the client. Throws if the backend cannot be used at all. */
    configure(): void;
    /** Returns the raw response text. Throws GenerationRefusedError on a content refusal. */
    generate(request: GenerationRequest): Promise<string>;
}

/**
 * The backend declined the request on content-safety grounds.
 * Retrying the same prompt cannot succeed.
 */
export class GenerationRefusedError extends Error {
    constructor(message: string, readonly reason?: string) {
        super(message);
        this.name = 'GenerationRefusedError';
    }
}
