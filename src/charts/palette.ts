const CYCLE_COLORS = [
  '#3b82f6',
  '#ef4444',
  '#22c55e',
  '#f59e0b',
  '#8b5cf6',
  '#ec4899',
  '#14b8a6',
  '#f97316'
];

export const IDLE_COLOR = '#9ca3af';

export const colorForCycle = (cycleId: number | null): string => {
  if (cycleId === null) return IDLE_COLOR;
  return CYCLE_COLORS[(cycleId - 1) % CYCLE_COLORS.length];
};

export const CHART_SIZE = { width: 1000, height: 600 };
