import { describe, it, expect } from 'vitest';
import { ScanController } from '../src/corroboration/scan-controller';

describe('ScanController', () => {
  it('stops on quorum when enabled', () => {
    const controller = new ScanController({ maxScans: 10, stopOnQuorum: true });
    expect(controller.observe(false)).toEqual({ kind: 'scanning' });
    expect(controller.observe(true)).toEqual({ kind: 'stopped', reason: 'quorum_reached' });
    expect(controller.scannedCount).toBe(2);
    expect(controller.isScanning).toBe(false);
  });

  it('ignores quorum when disabled and stops at the budget', () => {
    const controller = new ScanController({ maxScans: 2, stopOnQuorum: false });
    expect(controller.observe(true)).toEqual({ kind: 'scanning' });
    expect(controller.observe(true)).toEqual({ kind: 'stopped', reason: 'budget_exhausted' });
  });

  it('prefers quorum over budget on the last allowed scan', () => {
    const controller = new ScanController({ maxScans: 1, stopOnQuorum: true });
    expect(controller.observe(true)).toEqual({ kind: 'stopped', reason: 'quorum_reached' });
  });

  it('reports no_candidates when exhausted before any scan', () => {
    const controller = new ScanController({ maxScans: 5, stopOnQuorum: true });
    expect(controller.exhaust()).toEqual({ kind: 'stopped', reason: 'no_candidates' });
  });

  it('reports candidates_exhausted after some scans', () => {
    const controller = new ScanController({ maxScans: 5, stopOnQuorum: true });
    controller.observe(false);
    expect(controller.exhaust()).toEqual({ kind: 'stopped', reason: 'candidates_exhausted' });
    expect(controller.current).toEqual({ kind: 'stopped', reason: 'candidates_exhausted' });
  });

  it('never resumes once stopped', () => {
    const controller = new ScanController({ maxScans: 1, stopOnQuorum: false });
    controller.observe(false);
    expect(() => controller.observe(false)).toThrow('Scan already stopped (budget_exhausted)');
    expect(() => controller.exhaust()).toThrow('Scan already stopped (budget_exhausted)');
  });

  it('rejects a non-positive budget', () => {
    expect(() => new ScanController({ maxScans: 0, stopOnQuorum: true })).toThrow(RangeError);
    expect(() => new ScanController({ maxScans: 1.5, stopOnQuorum: true })).toThrow(RangeError);
  });
});
