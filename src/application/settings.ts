export type TocPosition = 'left' | 'right';

export interface OutlineSettings {
  tocPosition: TocPosition;
  tocMaxLevel: number;
  tocCollapsedByDefault: boolean;
  fixCodeBlocks: boolean;
}

export const DEFAULT_SETTINGS: OutlineSettings = {
  tocPosition: 'left',
  tocMaxLevel: 6,
  tocCollapsedByDefault: false,
  fixCodeBlocks: true,
};

const TOC_LEVEL_RANGE = { min: 1, max: 6 };
const TOC_POSITIONS: TocPosition[] = ['left', 'right'];

export function mergeOutlineSettings(parsed: unknown): OutlineSettings {
  const source = asRecord(parsed);

  return {
    tocPosition: asTocPosition(source.tocPosition, DEFAULT_SETTINGS.tocPosition),
    tocMaxLevel: asNumberInRange(
      source.tocMaxLevel,
      DEFAULT_SETTINGS.tocMaxLevel,
      TOC_LEVEL_RANGE.min,
      TOC_LEVEL_RANGE.max,
      true
    ),
    tocCollapsedByDefault: asBoolean(
      source.tocCollapsedByDefault,
      DEFAULT_SETTINGS.tocCollapsedByDefault
    ),
    fixCodeBlocks: asBoolean(source.fixCodeBlocks, DEFAULT_SETTINGS.fixCodeBlocks),
  };
}

export function isTocPosition(value: unknown): value is TocPosition {
  return typeof value === 'string' && TOC_POSITIONS.some((position) => position === value);
}

function asRecord(value: unknown): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return {};
  }
  return value as Record<string, unknown>;
}

function asBoolean(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback;
}

function asTocPosition(value: unknown, fallback: TocPosition): TocPosition {
  return isTocPosition(value) ? value : fallback;
}

function asNumberInRange(
  value: unknown,
  fallback: number,
  min: number,
  max: number,
  round = false
): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return fallback;
  }
  const clamped = Math.min(max, Math.max(min, value));
  return round ? Math.round(clamped) : clamped;
}
