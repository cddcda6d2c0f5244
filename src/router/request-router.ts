/**
 * Request router: resolves which provider/model pairs may serve a request
 * under the caller's virtual key, dispatches to the provider adapters and
 * falls back across targets when an upstream fails.
 */

import {
  ModelNotAllowedError,
  UpstreamProviderError,
  ValidationError,
} from "../errors.js";
import type { AuthOutcome } from "../governance/auth-resolver.js";
import { restrictingKey, splitModelId, virtualKeyPermits } from "../governance/model-filter.js";
import type { ProviderRegistry } from "../providers/registry.js";
import type {
  ChatCompletionChunk,
  ChatCompletionRequest,
  ChatCompletionResponse,
  ChatProvider,
  EmbeddingRequest,
  EmbeddingResponse,
  ProviderCallOptions,
} from "../providers/types.js";
import { silentLogger, type Logger } from "../utils/logger.js";

export interface RouteTarget {
  provider: string;
  model: string;
  adapter: ChatProvider;
}

export interface RequestRouterOptions {
  /** Source of randomness for weighted provider selection. */
  random?: () => number;
  logger?: Logger;
}

interface Candidate {
  provider: string;
  weight: number;
}

/**
 * Weighted random ordering: each candidate scores u^(1/w) and the list is
 * sorted by descending score. A zero weight always sorts last.
 */
export function weightedOrder<T extends Candidate>(candidates: readonly T[], random: () => number): T[] {
  return candidates
    .map((candidate) => ({
      candidate,
      score: candidate.weight > 0 ? Math.pow(random(), 1 / candidate.weight) : -1,
    }))
    .sort((a, b) => b.score - a.score)
    .map(({ candidate }) => candidate);
}

export class RequestRouter {
  private random: () => number;
  private logger: Logger;

  constructor(
    private registry: ProviderRegistry,
    options: RequestRouterOptions = {},
  ) {
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? silentLogger;
  }

  private target(provider: string, model: string): RouteTarget {
    const adapter = this.registry.getProvider(provider);
    if (!adapter) {
      throw new ValidationError(`Provider ${provider} is not configured`, {
        code: "PROVIDER_NOT_CONFIGURED",
        param: "model",
        extraFields: { provider, model_requested: model },
      });
    }
    return { provider, model, adapter };
  }

  /**
   * Whether the outcome's filtered catalog contains `provider/model`. An
   * unrestricted outcome may also call models the catalog does not list.
   */
  private permits(outcome: AuthOutcome, provider: string, model: string): boolean {
    const key = restrictingKey(outcome);
    if (key === null) {
      return true;
    }
    return (
      this.registry.listModelsForProvider(provider).includes(model) && virtualKeyPermits(key, provider, model)
    );
  }

  /**
   * Provider for a model given without a `provider/` prefix: a weighted pick
   * among the key's permitting configs, or the first provider listing it.
   */
  private unprefixedTarget(model: string, outcome: AuthOutcome): RouteTarget | null {
    const key = restrictingKey(outcome);
    if (key === null) {
      const [provider] = this.registry.providersListing(model);
      return provider === undefined ? null : this.target(provider, model);
    }

    const candidates = key.provider_configs.filter((config) => this.permits(outcome, config.provider, model));
    const [picked] = weightedOrder(candidates, this.random);
    if (picked !== undefined) {
      return this.target(picked.provider, model);
    }

    const [listing] = this.registry.providersListing(model);
    if (listing !== undefined) {
      throw new ModelNotAllowedError(listing, model);
    }
    return null;
  }

  private primaryTarget(model: string, outcome: AuthOutcome): RouteTarget {
    const parts = splitModelId(model);
    if (parts && this.registry.hasProvider(parts.provider)) {
      if (!this.permits(outcome, parts.provider, parts.model)) {
        throw new ModelNotAllowedError(parts.provider, parts.model);
      }
      return this.target(parts.provider, parts.model);
    }

    const target = this.unprefixedTarget(model, outcome);
    if (target) {
      return target;
    }
    if (parts) {
      return this.target(parts.provider, parts.model);
    }
    throw new ValidationError("Model must be in the format of 'provider/model'", {
      param: "model",
      extraFields: { model_requested: model },
    });
  }

  /**
   * Ordered targets for a request: the primary model first, then every
   * permitted fallback. Fallbacks the virtual key does not permit are skipped.
   */
  resolveTargets(model: string, fallbacks: readonly string[] | undefined, outcome: AuthOutcome): RouteTarget[] {
    const trimmed = model.trim();
    if (!trimmed) {
      throw new ValidationError("Model is required", { param: "model", code: "MISSING_MODEL" });
    }

    const targets = [this.primaryTarget(trimmed, outcome)];
    for (const fallback of fallbacks ?? []) {
      const parts = splitModelId(fallback.trim());
      if (!parts) {
        throw new ValidationError("Fallback must be in the format of 'provider/model'", { param: "fallbacks" });
      }
      if (!this.registry.hasProvider(parts.provider) || !this.permits(outcome, parts.provider, parts.model)) {
        this.logger.debug(`Skipping fallback ${fallback}: not available for this request`);
        continue;
      }
      targets.push(this.target(parts.provider, parts.model));
    }

    const seen = new Set<string>();
    return targets.filter((target) => {
      const id = `${target.provider}/${target.model}`;
      if (seen.has(id)) {
        return false;
      }
      seen.add(id);
      return true;
    });
  }

  private canFallBack(error: unknown): boolean {
    return error instanceof UpstreamProviderError && error.code !== "REQUEST_ABORTED";
  }

  /**
   * Runs `call` against each target in order until one succeeds; the error of
   * the primary target is reported when every target fails.
   */
  private async withFallbacks<T>(
    targets: readonly RouteTarget[],
    call: (target: RouteTarget) => Promise<T>,
  ): Promise<T> {
    let primaryError: unknown;
    for (const [index, target] of targets.entries()) {
      try {
        return await call(target);
      } catch (error) {
        if (index === 0) {
          primaryError = error;
        }
        if (!this.canFallBack(error)) {
          throw error;
        }
        if (index === targets.length - 1) {
          throw primaryError;
        }
        this.logger.warn(
          `Provider ${target.provider} failed for ${target.model}, trying fallback: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }
    throw primaryError;
  }

  private upstreamRequest<R extends { model: string; fallbacks?: string[] }>(request: R, target: RouteTarget): R {
    const upstream = { ...request, model: target.model };
    delete upstream.fallbacks;
    return upstream;
  }

  async chatCompletion(
    request: ChatCompletionRequest,
    outcome: AuthOutcome,
    options: ProviderCallOptions = {},
  ): Promise<ChatCompletionResponse> {
    const targets = this.resolveTargets(request.model, request.fallbacks, outcome);
    return this.withFallbacks(targets, async (target) => {
      const response = await target.adapter.chatCompletion(this.upstreamRequest(request, target), options);
      return { ...response, extra_fields: { provider: target.provider, model_requested: target.model } };
    });
  }

  /**
   * Targets are resolved before the first chunk is requested, so permission
   * and validation errors are thrown from this call rather than mid-stream.
   */
  chatCompletionStream(
    request: ChatCompletionRequest,
    outcome: AuthOutcome,
    options: ProviderCallOptions = {},
  ): AsyncGenerator<ChatCompletionChunk> {
    const targets = this.resolveTargets(request.model, request.fallbacks, outcome);
    return this.streamTargets(request, targets, options);
  }

  private async *streamTargets(
    request: ChatCompletionRequest,
    targets: readonly RouteTarget[],
    options: ProviderCallOptions,
  ): AsyncGenerator<ChatCompletionChunk> {
    let primaryError: unknown;
    for (const [index, target] of targets.entries()) {
      let yielded = false;
      try {
        const stream = target.adapter.chatCompletionStream(this.upstreamRequest(request, target), options);
        for await (const chunk of stream) {
          yielded = true;
          yield { ...chunk, extra_fields: { provider: target.provider, model_requested: target.model } };
        }
        return;
      } catch (error) {
        if (index === 0) {
          primaryError = error;
        }
        if (yielded || !this.canFallBack(error)) {
          throw error;
        }
        if (index === targets.length - 1) {
          throw primaryError;
        }
        this.logger.warn(`Stream from ${target.provider} failed before first chunk, trying fallback`);
      }
    }
  }

  async embeddings(
    request: EmbeddingRequest,
    outcome: AuthOutcome,
    options: ProviderCallOptions = {},
  ): Promise<EmbeddingResponse> {
    const targets = this.resolveTargets(request.model, request.fallbacks, outcome);
    return this.withFallbacks(targets, async (target) => {
      const response = await target.adapter.embeddings(this.upstreamRequest(request, target), options);
      return { ...response, extra_fields: { provider: target.provider, model_requested: target.model } };
    });
  }
}
