export const ReportStatus = {
  CREATED: 'CREATED',
  RUNNING: 'RUNNING',
  COMPLETED: 'COMPLETED',
  CANCELLED: 'CANCELLED',
  FAILED: 'FAILED',
} as const;

export type ReportStatus = (typeof ReportStatus)[keyof typeof ReportStatus];

const VALID_TRANSITIONS: Record<ReportStatus, readonly ReportStatus[]> = {
  [ReportStatus.CREATED]: [ReportStatus.RUNNING],
  [ReportStatus.RUNNING]: [ReportStatus.COMPLETED, ReportStatus.CANCELLED, ReportStatus.FAILED],
  [ReportStatus.COMPLETED]: [],
  [ReportStatus.CANCELLED]: [],
  [ReportStatus.FAILED]: [],
};

export function canTransition(from: ReportStatus, to: ReportStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}
