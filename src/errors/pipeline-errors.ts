import { MemoforgeError } from './base';

export class StageExecutionError extends MemoforgeError {
  constructor(
    public readonly stage: string,
    public readonly failure: Error
  ) {
    super(`Stage '${stage}' failed: ${failure.message}`, 'STAGE_FAILED');
    this.name = 'StageExecutionError';
  }
}

export class PipelineInterruptedError extends MemoforgeError {
  constructor(public readonly stage: string) {
    super(`Pipeline interrupted during stage '${stage}'`, 'INTERRUPTED');
    this.name = 'PipelineInterruptedError';
  }
}

export class OperationAbortedError extends MemoforgeError {
  constructor(label: string) {
    super(`${label} aborted`, 'ABORTED');
    this.name = 'OperationAbortedError';
  }
}
