import { ulid } from "ulid";

export type EventId = `evt_${string}`;
export type CycleId = `cyc_${string}`;

function withPrefix<T extends string>(prefix: T): `${T}${string}` {
  return `${prefix}${ulid()}` as `${T}${string}`;
}

export function newEventId(): EventId {
  return withPrefix("evt_");
}

export function newCycleId(): CycleId {
  return withPrefix("cyc_");
}
