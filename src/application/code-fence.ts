const CODE_FENCE_DELIMITER = /^\s*`{3,}/;

export function isCodeFenceDelimiter(line: string): boolean {
  return CODE_FENCE_DELIMITER.test(line);
}

export function nextCodeFenceState(insideFence: boolean, line: string): boolean {
  return isCodeFenceDelimiter(line) ? !insideFence : insideFence;
}
