import type { StopReason } from './types';

export interface StoppedState {
  kind: 'stopped';
  reason: StopReason;
}

export type ScanState = { kind: 'scanning' } | StoppedState;

export interface ScanControllerOptions {
  maxScans: number;
  /** When false the scan always runs to the end of its budget. */
  stopOnQuorum: boolean;
}

/*
 * Early-stop state machine: Scanning -> Stopped(reason).
 * Single pass; once stopped it never resumes.
 */
export class ScanController {
  private state: ScanState = { kind: 'scanning' };
  private scanned = 0;

  constructor(private readonly options: ScanControllerOptions) {
    if (!Number.isInteger(options.maxScans) || options.maxScans < 1) {
      throw new RangeError(`maxScans must be a positive integer, got ${options.maxScans}`);
    }
  }

  get current(): ScanState {
    return this.state;
  }

  get scannedCount(): number {
    return this.scanned;
  }

  get isScanning(): boolean {
    return this.state.kind === 'scanning';
  }

  /*
   * Called once per scanned chunk, after any ledger update for it.
   * `quorumReached` reports whether some value now has QUORUM domains.
   */
  observe(quorumReached: boolean): ScanState {
    this.assertScanning();
    this.scanned += 1;
    if (this.options.stopOnQuorum && quorumReached) {
      this.state = { kind: 'stopped', reason: 'quorum_reached' };
    } else if (this.scanned >= this.options.maxScans) {
      this.state = { kind: 'stopped', reason: 'budget_exhausted' };
    }
    return this.state;
  }

  /** The candidate list ran out while still scanning. */
  exhaust(): StoppedState {
    this.assertScanning();
    const stopped: StoppedState = {
      kind: 'stopped',
      reason: this.scanned === 0 ? 'no_candidates' : 'candidates_exhausted',
    };
    this.state = stopped;
    return stopped;
  }

  private assertScanning(): void {
    if (this.state.kind !== 'scanning') {
      throw new Error(`Scan already stopped (${this.state.reason})`);
    }
  }
}
