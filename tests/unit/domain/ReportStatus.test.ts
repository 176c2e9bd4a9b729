import { describe, it, expect } from 'vitest';
import { ReportStatus, canTransition } from '../../../src/domain/model/ReportStatus.js';

describe('ReportStatus', () => {
  it('should allow a report to start once', () => {
    expect(canTransition(ReportStatus.CREATED, ReportStatus.RUNNING)).toBe(true);
    expect(canTransition(ReportStatus.COMPLETED, ReportStatus.RUNNING)).toBe(false);
  });

  it('should allow a running report to end in any terminal state', () => {
    expect(canTransition(ReportStatus.RUNNING, ReportStatus.COMPLETED)).toBe(true);
    expect(canTransition(ReportStatus.RUNNING, ReportStatus.CANCELLED)).toBe(true);
    expect(canTransition(ReportStatus.RUNNING, ReportStatus.FAILED)).toBe(true);
  });

  it('should not allow leaving a terminal state', () => {
    expect(canTransition(ReportStatus.FAILED, ReportStatus.COMPLETED)).toBe(false);
    expect(canTransition(ReportStatus.CANCELLED, ReportStatus.RUNNING)).toBe(false);
  });

  it('should not allow finishing a report that never started', () => {
    expect(canTransition(ReportStatus.CREATED, ReportStatus.COMPLETED)).toBe(false);
  });
});
