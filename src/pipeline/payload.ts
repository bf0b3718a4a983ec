import { DocumentRef, StagePayload } from "../types";

export function createInitialPayload(ref: DocumentRef): StagePayload {
  return {
    bucket: ref.container,
    key: ref.key,
  };
}

export function clonePayload(payload: StagePayload): StagePayload {
  return structuredClone(payload);
}

export interface MergeResult {
  payload: StagePayload;
  addedKeys: string[];
  removedKeys: string[];
}

export function mergePayload(previous: StagePayload, updated: StagePayload): MergeResult {
  const removedKeys = Object.keys(previous).filter((key) => !Object.prototype.hasOwnProperty.call(updated, key));
  const addedKeys = Object.keys(updated).filter((key) => !Object.prototype.hasOwnProperty.call(previous, key));
  return {
    payload: { ...clonePayload(previous), ...clonePayload(updated) },
    addedKeys,
    removedKeys,
  };
}

export function omitKeys(payload: StagePayload, keys: Iterable<string>): StagePayload {
  const dropped = new Set(keys);
  const result: StagePayload = {};
  for (const [key, value] of Object.entries(clonePayload(payload))) {
    if (!dropped.has(key)) {
      result[key] = value;
    }
  }
  return result;
}
