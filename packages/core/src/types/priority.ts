export const Priority = {
  Low: 'Low',
  Moderate: 'Moderate',
  High: 'High',
} as const;

export type Priority = (typeof Priority)[keyof typeof Priority];

/** Ordered lowest to highest */
export const PRIORITY_VALUES = [Priority.Low, Priority.Moderate, Priority.High] as const;

export const DEFAULT_PRIORITY: Priority = Priority.Moderate;
