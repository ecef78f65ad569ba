import type { AnonymizedResponse, ResponseLabel, Stage1Result } from '../council/stage-results.js';

const ALPHABET_SIZE = 26;
const CHAR_CODE_A = 65;

/** 0 -> `A`, 25 -> `Z`, 26 -> `AA`, 27 -> `AB`, like spreadsheet columns. */
export function indexToLabel(index: number): ResponseLabel {
  if (!Number.isInteger(index) || index < 0) {
    throw new RangeError(`Label index must be a non-negative integer, got ${index}`);
  }
  let label = '';
  let n = index + 1;
  while (n > 0) {
    const rem = (n - 1) % ALPHABET_SIZE;
    label = String.fromCharCode(CHAR_CODE_A + rem) + label;
    n = Math.floor((n - 1) / ALPHABET_SIZE);
  }
  return label;
}

/** Inverse of `indexToLabel`; -1 for anything that is not an uppercase label. */
export function labelToIndex(label: ResponseLabel): number {
  if (!/^[A-Z]+$/.test(label)) return -1;
  let n = 0;
  for (const ch of label) {
    n = n * ALPHABET_SIZE + (ch.charCodeAt(0) - CHAR_CODE_A + 1);
  }
  return n - 1;
}

export function compareLabels(a: ResponseLabel, b: ResponseLabel): number {
  return labelToIndex(a) - labelToIndex(b);
}

export function formatLabel(label: ResponseLabel): string {
  return `Response ${label}`;
}

export interface Anonymization {
  responses: AnonymizedResponse[];
  labelToModel: Record<ResponseLabel, string>;
}

/**
 * Labels follow the order of `stage1`, which is the order the Stage 1 calls
 * were issued in, so the same input always gets the same labels.
 */
export function anonymizeResponses(stage1: readonly Stage1Result[]): Anonymization {
  const responses: AnonymizedResponse[] = [];
  const labelToModel: Record<ResponseLabel, string> = {};
  stage1.forEach((result, i) => {
    const label = indexToLabel(i);
    responses.push({ label, model: result.model, content: result.content });
    labelToModel[label] = result.model;
  });
  return { responses, labelToModel };
}
