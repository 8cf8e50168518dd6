/**
 * Generation Gateway
 *
 * Walks an ordered list of backend strategies. Each strategy is probed once
 * for availability, then attempted under its own retry policy. The first
 * non-empty completion wins; when every strategy is skipped or exhausted the
 * caller gets a GenerationError carrying the full attempt log.
 */

import * as Logging from '../logging';
import { GenerationAttempt, GenerationError, errorMessage } from '../errors';
import { retry } from '../util/retry';
import { SYSTEM_PROMPTS } from './prompts';
import {
    BackendStrategy,
    CompletionParams,
    GatewayConfig,
    GatewayInstance,
    GenerationBackend,
    GenerationRequest,
} from './types';

const orderStrategies = (strategies: BackendStrategy[], preferLocal: boolean): BackendStrategy[] => {
    const enabled = strategies.filter((strategy) => strategy.enabled !== false);
    if (preferLocal) {
        return enabled;
    }
    return [
        ...enabled.filter((strategy) => strategy.backend.kind === 'remote'),
        ...enabled.filter((strategy) => strategy.backend.kind !== 'remote'),
    ];
};

export const create = (config: GatewayConfig): GatewayInstance => {
    const logger = Logging.getLogger();

    const probe = async (backend: GenerationBackend): Promise<boolean> => {
        try {
            return await backend.isAvailable();
        } catch (error) {
            logger.debug('Availability probe for %s threw: %s', backend.name, errorMessage(error));
            return false;
        }
    };

    const generate = async (request: GenerationRequest): Promise<string> => {
        if (!request.prompt.trim()) {
            throw new GenerationError('Cannot generate from an empty prompt', { exhausted: false });
        }

        const params: CompletionParams = {
            systemPrompt: request.systemPrompt ?? SYSTEM_PROMPTS[request.role],
            temperature: request.temperature ?? config.defaultTemperature,
        };
        const attempts: GenerationAttempt[] = [];
        const strategies = orderStrategies(config.strategies, request.preferLocal ?? true);

        for (const { backend, policy } of strategies) {
            if (!await probe(backend)) {
                logger.info('Generation backend %s is not available, skipping', backend.name);
                continue;
            }

            logger.debug('Generating %s with %s', request.role, backend.name);
            try {
                return await retry(async () => {
                    const text = (await backend.complete(request.prompt, params)).trim();
                    if (!text) {
                        throw new Error('Backend returned an empty completion');
                    }
                    return text;
                }, policy, {
                    sleep: config.sleep,
                    onFailedAttempt: (error, attempt) => {
                        attempts.push({ backend: backend.name, attempt, error: errorMessage(error) });
                        logger.warn('Generation attempt %d/%d with %s failed: %s', attempt, policy.attempts, backend.name, errorMessage(error));
                    },
                });
            } catch (error) {
                logger.warn('Generation backend %s exhausted, falling back: %s', backend.name, errorMessage(error));
            }
        }

        const message = attempts.length > 0
            ? `All generation backends failed after ${attempts.length} attempts`
            : 'No generation backend is available';
        logger.error(message);
        throw new GenerationError(message, { exhausted: true, attempts });
    };

    return {
        generate,
        backends: () => config.strategies.map((strategy) => strategy.backend.name),
    };
};
