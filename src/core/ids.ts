import type { ElementId } from '../types';

export type IdFactory = () => ElementId;

let sequence = 0;

/**
 * Opaque id unique within the process: time, a process-wide sequence and a random suffix.
 */
export const createElementId: IdFactory = () => {
  sequence += 1;
  return `el-${Date.now().toString(36)}-${sequence.toString(36)}-${Math.random().toString(36).slice(2, 10)}`;
};
