import { GoogleGenerativeAI, GoogleGenerativeAIFetchError, type GenerativeModel } from '@google/generative-ai';
import type { LLMProvider, LLMResult, RequestOptions, StructuredSchema } from './llm-provider';
import { DefaultRequestBuilder, type RequestBuilder } from './request-builder';
import { printRequest, printResponse, type DebugOptions } from './debug-output';
import { ValidationError, handleUnknownError } from '../errors/index';
import { ProviderRequestError, isTransientStatus } from '../errors/provider-errors';

export interface GeminiConfig extends DebugOptions {
    apiKey: string;
    model?: string;
    temperature?: number;
}

export const GeminiDefaultConfig = {
    model: 'gemini-1.5-pro',
    temperature: 0.2,
};

export class GeminiProvider implements LLMProvider {
    readonly id: string;
    private model: GenerativeModel;
    private config: GeminiConfig & { model: string };
    private builder: RequestBuilder;

    constructor(config: GeminiConfig, builder?: RequestBuilder) {
        const client = new GoogleGenerativeAI(config.apiKey);
        this.config = {
            ...config,
            model: config.model ?? GeminiDefaultConfig.model,
            temperature: config.temperature ?? GeminiDefaultConfig.temperature,
        };
        this.id = `gemini:${this.config.model}`;
        this.model = client.getGenerativeModel({
            model: this.config.model,
            generationConfig: {
                ...(this.config.temperature !== undefined && { temperature: this.config.temperature }),
                responseMimeType: 'application/json',
            },
        });
        this.builder = builder ?? new DefaultRequestBuilder();
    }

    async runPromptStructured(
        content: string,
        promptText: string,
        schema: StructuredSchema,
        options: RequestOptions = {}
    ): Promise<LLMResult<unknown>> {
        const systemPrompt = this.builder.buildPromptBodyForStructured(promptText);

        // Gemini's response schema dialect is narrower than JSON Schema, so the schema travels in the prompt
        const fullPrompt = [
            systemPrompt,
            'You must output valid JSON that adheres to the following schema:',
            JSON.stringify(schema.schema, null, 2),
            'Input:',
            content,
        ].join('\n\n');

        printRequest('Gemini', { model: this.config.model, temperature: this.config.temperature }, fullPrompt, content, this.config);

        let text: string;
        let usage: LLMResult<unknown>['usage'];
        try {
            const result = await this.model.generateContent(
                fullPrompt,
                options.signal ? { signal: options.signal } : undefined
            );
            text = result.response.text();
            const meta = result.response.usageMetadata;
            if (meta) {
                usage = { inputTokens: meta.promptTokenCount, outputTokens: meta.candidatesTokenCount };
            }
        } catch (e: unknown) {
            if (e instanceof GoogleGenerativeAIFetchError) {
                throw new ProviderRequestError(
                    `Gemini API error (${e.status ?? 'network'}): ${e.message}`,
                    e.status === undefined || isTransientStatus(e.status),
                    e.status
                );
            }
            const err = handleUnknownError(e, 'Gemini API call');
            throw new ProviderRequestError(`Gemini API call failed: ${err.message}`, false);
        }

        printResponse({ usage }, text, this.config);

        try {
            return { data: JSON.parse(text), ...(usage && { usage }) };
        } catch (e: unknown) {
            const err = handleUnknownError(e, 'JSON parsing');
            throw new ValidationError(`Failed to parse structured JSON response: ${err.message}`, e);
        }
    }
}
