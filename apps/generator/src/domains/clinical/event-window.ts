import type { EncounterRecord } from '../dataset/dataset.types.js';

export interface EventWindow {
  start: Date;
  end: Date;
  lengthMs: number;
}

/** [admit, discharge] for discharged encounters, [admit, reference date] otherwise. */
export function eventWindow(encounter: EncounterRecord, referenceDate: Date): EventWindow {
  const start = encounter.admitDate;
  const end = encounter.dischargeDate ?? referenceDate;
  return { start, end, lengthMs: end.getTime() - start.getTime() };
}

/** Zero or negative windows cannot hold any event. */
export function isPlaceable(window: EventWindow): boolean {
  return window.lengthMs > 0;
}

export function isWithin(instant: Date, window: EventWindow): boolean {
  const t = instant.getTime();
  return t >= window.start.getTime() && t <= window.end.getTime();
}

/** Instants start, start + step, ... up to and including end. */
export function cadence(window: EventWindow, stepMs: number): Date[] {
  const times: Date[] = [];
  for (let t = window.start.getTime(); t <= window.end.getTime(); t += stepMs) {
    times.push(new Date(t));
  }
  return times;
}

/** Records placed for one entity, plus the count that had nowhere to go. */
export interface PlacementResult<T> {
  records: T[];
  skipped: number;
}
