import { parseEnvironment } from '../boundaries/env-parser';
import {
  PipelineInterruptedError,
  StageExecutionError,
  handleUnknownError,
} from '../errors/index';
import { error } from '../output/logger';
import { createGenerators, type Generators } from '../providers/provider-factory';
import { STRICTNESS_SCHEMA, type Strictness } from '../schemas/fact-check-schemas';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

/**
 * Collaborators a command reaches outside its own arguments. Tests swap
 * them for in-process stand-ins.
 */
export interface CommandDeps {
  cwd?: () => string;
  env?: NodeJS.ProcessEnv;
  generators?: () => Generators;
  signal?: AbortSignal;
  now?: () => Date;
  exit?: (code: number) => void;
}

export interface ResolvedDeps {
  cwd: string;
  env: NodeJS.ProcessEnv;
  generators: () => Generators;
  signal?: AbortSignal;
  now: () => Date;
  exit: (code: number) => void;
}

export function resolveDeps(deps: CommandDeps): ResolvedDeps {
  const env = deps.env ?? process.env;
  return {
    cwd: deps.cwd ? deps.cwd() : process.cwd(),
    env,
    generators: deps.generators ?? (() => createGenerators(parseEnvironment(env))),
    ...(deps.signal ? { signal: deps.signal } : {}),
    now: deps.now ?? (() => new Date()),
    exit: deps.exit ?? ((code: number) => process.exit(code)),
  };
}

/** FACT_CHECK_STRICTNESS, when set to a known level. */
export function envStrictness(env: NodeJS.ProcessEnv): Strictness | undefined {
  const result = STRICTNESS_SCHEMA.safeParse(env.FACT_CHECK_STRICTNESS?.trim().toLowerCase());
  return result.success ? result.data : undefined;
}

/**
 * Prints a command failure and returns its exit code. Stage failures and
 * interrupts name the stage and how to pick the run back up.
 */
export function reportFailure(e: unknown, context: string, resumeHint?: string): number {
  if (e instanceof PipelineInterruptedError) {
    error(`\n${e.message}`);
    if (resumeHint) error(`Resume with: ${resumeHint}`);
    return EXIT_INTERRUPTED;
  }
  if (e instanceof StageExecutionError) {
    error(`Error: ${e.message}`);
    if (resumeHint) error(`Completed stages are saved. Resume with: ${resumeHint}`);
    return EXIT_FAILURE;
  }
  const err = handleUnknownError(e, context);
  error(`Error: ${err.message}`);
  return EXIT_FAILURE;
}
