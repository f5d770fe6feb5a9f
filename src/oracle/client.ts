import { OpenAI } from 'openai';
import { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import * as Logging from '@/logging';
import { ORACLE_MAX_TOKENS, ORACLE_TEMPERATURE } from '@/constants';
import { CompletionFn, OracleConfig, OracleError } from './types';

/**
 * Chat completion against any OpenAI-compatible endpoint. One attempt per
 * call: a timeout is a failure like any other and the caller falls back.
 */
export const createCompletionFn = (config: OracleConfig): CompletionFn => {
    const logger = Logging.getLogger();
    let client: OpenAI | null = null;

    const getClient = (): OpenAI => {
        if (!client) {
            client = new OpenAI({
                apiKey: config.apiKey,
                baseURL: config.baseUrl,
                timeout: config.timeout,
                maxRetries: 0,
            });
        }
        return client;
    };

    return async (messages: ChatCompletionMessageParam[]): Promise<string> => {
        const startTime = Date.now();
        logger.debug('Sending request to %s', config.model);
        try {
            const completion = await getClient().chat.completions.create({
                model: config.model,
                messages,
                temperature: ORACLE_TEMPERATURE,
                max_tokens: ORACLE_MAX_TOKENS,
            });
            const duration = ((Date.now() - startTime) / 1000).toFixed(1);
            logger.debug('%s responded in %ss', config.model, duration);

            const response = completion.choices[0]?.message?.content?.trim();
            if (!response) {
                throw new OracleError('No response received from model');
            }
            return response;
        } catch (error: unknown) {
            if (error instanceof OracleError) {
                throw error;
            }
            const message = error instanceof Error ? error.message : String(error);
            throw new OracleError(`Oracle request failed: ${message}`);
        }
    };
};
