/**
 * Fenced code blocks indented by 2-4 spaces under a list item lose their list
 * context in some renderers once the block body contains a blank line. Pushing
 * the whole block two spaces deeper makes it unambiguous list content.
 *
 * Whitespace here is ASCII only, so byte lines read one char per byte match
 * the same patterns as decoded text.
 */
const LIST_FENCE_OPEN = /^([\t\f\r ]+)`{3,}(\w*)/;
const LIST_FENCE_CLOSE = /^([\t\f\r ]+)`{3,}$/;
const LIST_FENCE_INDENT = { min: 2, max: 4 };
const EXTRA_INDENT = '  ';
const EXTRA_INDENT_BYTES = Uint8Array.of(0x20, 0x20);
const LINE_FEED = 0x0a;

export function fixIndentedCodeBlocks(source: string): string {
  const lines = source.split('\n');
  const shifted = shiftedLines(lines);
  return lines.map((line, index) => (shifted[index] ? EXTRA_INDENT + line : line)).join('\n');
}

/** Byte-level variant; bytes outside shifted lines are copied untouched. */
export function fixIndentedCodeBlockBytes(source: Uint8Array): Uint8Array {
  const lines = splitByteLines(source);
  const shifted = shiftedLines(lines.map(byteLineText));
  const shiftCount = shifted.filter(Boolean).length;
  if (shiftCount === 0) {
    return source;
  }

  const fixed = new Uint8Array(source.length + shiftCount * EXTRA_INDENT_BYTES.length);
  let offset = 0;
  lines.forEach((line, index) => {
    if (index > 0) {
      fixed[offset] = LINE_FEED;
      offset += 1;
    }
    if (shifted[index]) {
      fixed.set(EXTRA_INDENT_BYTES, offset);
      offset += EXTRA_INDENT_BYTES.length;
    }
    fixed.set(line, offset);
    offset += line.length;
  });
  return fixed;
}

function shiftedLines(lines: readonly string[]): boolean[] {
  const shifted: boolean[] = [];
  let openIndent: number | null = null;

  for (const line of lines) {
    if (openIndent === null) {
      const indent = fenceIndent(LIST_FENCE_OPEN, line);
      const opens =
        indent !== null && indent >= LIST_FENCE_INDENT.min && indent <= LIST_FENCE_INDENT.max;
      if (opens) {
        openIndent = indent;
      }
      shifted.push(opens);
      continue;
    }

    // An unterminated fence keeps indenting through the end of the document.
    if (fenceIndent(LIST_FENCE_CLOSE, line) === openIndent) {
      openIndent = null;
    }
    shifted.push(true);
  }

  return shifted;
}

function fenceIndent(pattern: RegExp, line: string): number | null {
  const match = pattern.exec(line);
  return match ? match[1].length : null;
}

function splitByteLines(source: Uint8Array): Uint8Array[] {
  const lines: Uint8Array[] = [];
  let start = 0;
  for (let index = 0; index < source.length; index += 1) {
    if (source[index] === LINE_FEED) {
      lines.push(source.subarray(start, index));
      start = index + 1;
    }
  }
  lines.push(source.subarray(start));
  return lines;
}

function byteLineText(line: Uint8Array): string {
  let text = '';
  for (const byte of line) {
    text += String.fromCharCode(byte);
  }
  return text;
}
