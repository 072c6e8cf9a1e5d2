import type { DayRange } from '../types/stripe';

const toEpochSeconds = (value: Date) => Math.floor(value.getTime() / 1000);

export const startOfLocalDay = (value: Date) =>
  new Date(value.getFullYear(), value.getMonth(), value.getDate());

export const getDayRange = (now: Date = new Date()): DayRange => ({
  gte: toEpochSeconds(startOfLocalDay(now)),
  lte: toEpochSeconds(now),
});

const pad = (value: number) => String(value).padStart(2, '0');

export const formatDisplayDate = (value: Date) =>
  `${pad(value.getDate())}.${pad(value.getMonth() + 1)}.${value.getFullYear()}`;

export const formatDisplayTime = (value: Date) =>
  `${pad(value.getHours())}:${pad(value.getMinutes())}`;
