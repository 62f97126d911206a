import { InvalidStateError } from '../../utils/errors';
import { RunStatus, StopReason } from '../../types/trading';

const STOP_STATUS: Record<Exclude<StopReason, 'end_of_data'>, RunStatus> = {
  time_limit: 'STOPPED_BY_TIME_LIMIT',
  loss_limit: 'STOPPED_BY_LOSS_LIMIT',
  signal: 'STOPPED_BY_SIGNAL',
  error: 'ERROR',
};

export function statusForStopReason(reason: StopReason): RunStatus {
  // A backtest that runs out of bars ends as if signalled
  return reason === 'end_of_data' ? 'STOPPED_BY_SIGNAL' : STOP_STATUS[reason];
}

/**
 * Lifecycle of one bot run: IDLE -> RUNNING -> one terminal status.
 * The first stop request wins; later requests do not change the reason.
 */
export class RunHandle {
  private status: RunStatus = 'IDLE';
  private pendingStop?: StopReason;
  private readonly controller = new AbortController();
  startedAt?: Date;
  stoppedAt?: Date;
  stopReason?: StopReason;
  lastError?: string;

  constructor(readonly runId: string) {}

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  getStatus(): RunStatus {
    return this.status;
  }

  isRunning(): boolean {
    return this.status === 'RUNNING';
  }

  isTerminal(): boolean {
    return this.status !== 'IDLE' && this.status !== 'RUNNING';
  }

  get stopRequested(): StopReason | undefined {
    return this.pendingStop;
  }

  start(at: Date): void {
    if (this.status !== 'IDLE') {
      throw new InvalidStateError(`Run ${this.runId} cannot start from ${this.status}`);
    }
    this.status = 'RUNNING';
    this.startedAt = at;
  }

  /**
   * Records why the run should stop and cancels in-flight work. Returns false
   * when a stop was already requested or the run has finished.
   */
  requestStop(reason: StopReason, error?: string): boolean {
    if (this.pendingStop || this.isTerminal()) {
      return false;
    }
    this.pendingStop = reason;
    if (error) this.lastError = error;
    this.controller.abort();
    return true;
  }

  finish(at: Date): RunStatus {
    if (this.isTerminal()) {
      return this.status;
    }
    const reason = this.pendingStop ?? 'signal';
    this.status = statusForStopReason(reason);
    this.stopReason = reason;
    this.stoppedAt = at;
    return this.status;
  }
}
