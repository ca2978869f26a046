import type { PhaseKey, PhaseOutputs } from "./schemas.js";

export class MissingPhaseOutputError extends Error {
  readonly phase: PhaseKey;

  constructor(phase: PhaseKey) {
    super(`Phase output "${phase}" is not available yet`);
    this.name = "MissingPhaseOutputError";
    this.phase = phase;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function requireOutput(outputs: PhaseOutputs, phase: PhaseKey): string {
  const text = outputs.get(phase);
  if (text === undefined) throw new MissingPhaseOutputError(phase);
  return text;
}

/** Returns a new map with `phase` appended; the input map is left untouched. */
export function appendOutput(outputs: PhaseOutputs, phase: PhaseKey, text: string): PhaseOutputs {
  if (outputs.has(phase)) {
    throw new Error(`Phase output "${phase}" was already recorded`);
  }
  const next = new Map(outputs);
  next.set(phase, text);
  return next;
}
