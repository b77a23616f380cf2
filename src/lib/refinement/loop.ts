import { z } from 'zod';

import {
  FALLBACK_CONFIGURATION,
  NUDGE_SUFFIX,
  REFINEMENT_DEFAULTS,
} from '../../config/constants.js';
import type {
  AnalysisSuggestion,
  FinalConfiguration,
  ModelClient,
  ParameterInput,
  PromptConfiguration,
  RefinementState,
} from '../../config/types.js';
import { ErrorCode, getErrorMessage, logger, McpError } from '../errors.js';
import { publishRefinementIteration } from '../telemetry.js';
import { getDefaultCatalog, type TemplateCatalog } from './catalog.js';
import { hasQueryPlaceholder, renderPrompt } from './composer.js';
import {
  finalizeConfiguration,
  type RecursionGuard,
  stripNudge,
} from './finalizer.js';
import {
  AnalysisGateway,
  buildAnalysisPrompt,
  parseAnalysisResponse,
} from './gateway.js';
import { mergeParameters } from './parameters.js';
import {
  rederiveConfiguration,
  selectConfiguration,
  type SelectionOverrides,
  suggestsNewSelection,
} from './selection.js';

export interface IterationProgress {
  iteration: number;
  maxIterations: number;
  quality: number;
  bestQuality: number;
  state: RefinementState;
  improved: boolean;
  candidate: string;
}

export interface RefineOptions {
  client: ModelClient;
  minIterations?: number;
  maxIterations?: number;
  qualityThreshold?: number;
  /** Pins the technique; model suggestions for it are ignored. */
  technique?: string;
  /** Overrides applied on top of every derived parameter set. */
  parameters?: ParameterInput;
  analysisParameters?: ParameterInput;
  catalog?: TemplateCatalog;
  signal?: AbortSignal;
  timeoutMs?: number;
  isRecursiveMathPrompt?: RecursionGuard;
  now?: () => Date;
  onIteration?: (progress: IterationProgress) => void | Promise<void>;
}

const LoopLimitsSchema = z
  .object({
    minIterations: z.number().int().min(0),
    maxIterations: z.number().int().min(1),
    qualityThreshold: z.number().min(0).max(1),
  })
  .refine((limits) => limits.minIterations <= limits.maxIterations, {
    message: 'minIterations must not exceed maxIterations',
    path: ['minIterations'],
  });

type LoopLimits = z.infer<typeof LoopLimitsSchema>;

function resolveLimits(options: RefineOptions): LoopLimits {
  const parsed = LoopLimitsSchema.safeParse({
    minIterations: options.minIterations ?? REFINEMENT_DEFAULTS.minIterations,
    maxIterations: options.maxIterations ?? REFINEMENT_DEFAULTS.maxIterations,
    qualityThreshold:
      options.qualityThreshold ?? REFINEMENT_DEFAULTS.qualityThreshold,
  });
  if (!parsed.success) {
    throw new McpError(
      ErrorCode.E_INVALID_INPUT,
      `Invalid refinement options: ${parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`
    );
  }
  return parsed.data;
}

type PassOutcome =
  | { kind: 'analyzed'; quality: number; suggestion: AnalysisSuggestion }
  | { kind: 'failed'; quality: 0 };

interface BestConfiguration extends PromptConfiguration {
  reasoning: string;
}

function canStop(passes: number, quality: number, limits: LoopLimits): boolean {
  return passes >= limits.minIterations && quality >= limits.qualityThreshold;
}

function pickImprovement(
  candidate: string,
  suggestion: AnalysisSuggestion | undefined
): string | null {
  const improved = suggestion?.improvedPrompt?.trim();
  if (!improved || improved === candidate.trim()) return null;
  return improved;
}

function recordBest(
  working: PromptConfiguration,
  suggestion: AnalysisSuggestion,
  overrides: SelectionOverrides
): BestConfiguration {
  const template =
    suggestion.template && hasQueryPlaceholder(suggestion.template)
      ? suggestion.template
      : working.template;
  return {
    role: working.role,
    taskType: working.taskType,
    technique: working.technique,
    template,
    parameters: mergeParameters(working.parameters, {
      ...suggestion.parameters,
      ...overrides.parameters,
    }),
    reasoning: suggestion.reasoning,
  };
}

function renderFinalPrompt(
  template: string,
  candidate: string,
  role: string
): string {
  try {
    return renderPrompt(template, stripNudge(candidate).trim(), role);
  } catch (error) {
    logger.warn(
      { reason: getErrorMessage(error) },
      'Best template could not be rendered; using candidate as-is'
    );
    return candidate;
  }
}

class RefinementRun {
  private readonly limits: LoopLimits;
  private readonly catalog: TemplateCatalog;
  private readonly gateway: AnalysisGateway;
  private readonly overrides: SelectionOverrides;

  private candidate: string;
  private working: PromptConfiguration;
  private best: BestConfiguration | null = null;
  private bestQuality = 0;
  private lastQuality = 0;
  private passes = 0;
  private state: RefinementState = 'RUNNING';

  constructor(
    private readonly query: string,
    private readonly options: RefineOptions
  ) {
    this.limits = resolveLimits(options);
    this.catalog = options.catalog ?? getDefaultCatalog();
    this.gateway = new AnalysisGateway(options.client);
    this.overrides = {
      ...(options.technique ? { technique: options.technique } : {}),
      ...(options.parameters ? { parameters: options.parameters } : {}),
    };
    this.candidate = query;
    this.working = selectConfiguration(query, this.catalog, this.overrides);
  }

  async run(): Promise<FinalConfiguration> {
    logger.debug(
      {
        role: this.working.role,
        taskType: this.working.taskType,
        technique: this.working.technique,
      },
      'Initial configuration selected'
    );

    while (this.state === 'RUNNING') {
      this.options.signal?.throwIfAborted();
      const outcome = await this.analyzeCandidate();
      this.passes += 1;
      this.lastQuality = outcome.quality;

      if (outcome.kind === 'analyzed') this.considerBest(outcome);
      const improved = this.advanceCandidate(outcome);
      this.state = this.nextState();
      await this.report(improved);
    }

    return this.finish();
  }

  private async analyzeCandidate(): Promise<PassOutcome> {
    const metaPrompt = buildAnalysisPrompt({
      candidate: this.candidate,
      configuration: this.working,
    });
    const call = await this.gateway.analyze(
      metaPrompt,
      this.options.analysisParameters,
      {
        ...(this.options.signal ? { signal: this.options.signal } : {}),
        ...(this.options.timeoutMs !== undefined
          ? { timeoutMs: this.options.timeoutMs }
          : {}),
      }
    );
    if (!call.ok) {
      logger.warn(
        { iteration: this.passes + 1, error: call.error },
        'Analysis call failed; scoring pass as zero'
      );
      return { kind: 'failed', quality: 0 };
    }

    const result = parseAnalysisResponse(call.text);
    if (result.usedDefaults) {
      logger.warn(
        { iteration: this.passes + 1, reason: result.defaultReason },
        'Analysis response unusable; scoring pass as zero'
      );
      return { kind: 'failed', quality: 0 };
    }
    return {
      kind: 'analyzed',
      quality: result.qualityScore,
      suggestion: result,
    };
  }

  private considerBest(
    outcome: Extract<PassOutcome, { kind: 'analyzed' }>
  ): void {
    if (outcome.quality <= this.bestQuality) return;

    if (suggestsNewSelection(outcome.suggestion, this.working)) {
      this.working = rederiveConfiguration(
        this.candidate,
        outcome.suggestion,
        this.catalog,
        this.overrides
      );
    }
    this.best = recordBest(this.working, outcome.suggestion, this.overrides);
    this.bestQuality = outcome.quality;
  }

  private advanceCandidate(outcome: PassOutcome): boolean {
    const suggestion =
      outcome.kind === 'analyzed' ? outcome.suggestion : undefined;
    const improved = pickImprovement(this.candidate, suggestion);
    if (improved) {
      this.candidate = improved;
      return true;
    }
    if (!canStop(this.passes, outcome.quality, this.limits)) {
      this.candidate += NUDGE_SUFFIX;
    }
    return false;
  }

  private nextState(): RefinementState {
    if (canStop(this.passes, this.lastQuality, this.limits)) return 'CONVERGED';
    if (this.passes >= this.limits.maxIterations) return 'EXHAUSTED';
    return 'RUNNING';
  }

  private async report(improved: boolean): Promise<void> {
    publishRefinementIteration({
      iteration: this.passes,
      quality: this.lastQuality,
      state: this.state,
      improved,
    });
    await this.options.onIteration?.({
      iteration: this.passes,
      maxIterations: this.limits.maxIterations,
      quality: this.lastQuality,
      bestQuality: this.bestQuality,
      state: this.state,
      improved,
      candidate: this.candidate,
    });
  }

  private finish(): FinalConfiguration {
    const state = this.state === 'CONVERGED' ? 'CONVERGED' : 'EXHAUSTED';
    const best = this.best;
    const draft = best
      ? {
          ...best,
          finalPrompt: renderFinalPrompt(
            best.template,
            this.candidate,
            best.role
          ),
        }
      : {
          ...FALLBACK_CONFIGURATION,
          technique: null,
          parameters: { ...FALLBACK_CONFIGURATION.parameters },
          finalPrompt: renderFinalPrompt(
            FALLBACK_CONFIGURATION.template,
            this.query,
            FALLBACK_CONFIGURATION.role
          ),
        };
    if (!best) {
      logger.warn(
        'No analysis pass produced a usable configuration; using fallback'
      );
    }

    return finalizeConfiguration(
      {
        ...draft,
        iterationsUsed: this.passes,
        finalQuality: this.lastQuality,
        state,
      },
      this.query,
      {
        catalog: this.catalog,
        ...(this.options.isRecursiveMathPrompt
          ? { isRecursiveMathPrompt: this.options.isRecursiveMathPrompt }
          : {}),
        ...(this.options.now ? { now: this.options.now } : {}),
      }
    );
  }
}

/**
 * Iteratively asks the model to grade and improve the query, tracking the
 * best-scoring configuration. Stops once quality reaches the threshold after
 * at least `minIterations` passes, or after `maxIterations` passes. Model
 * failures count as zero-quality passes; only invalid options or an aborted
 * signal make this reject.
 */
export async function refine(
  query: string,
  options: RefineOptions
): Promise<FinalConfiguration> {
  return new RefinementRun(query, options).run();
}
