import { InvalidWindowError } from "./errors";

/** Half-open time range `[start, end)`. */
export type ExtractionWindow = {
  start: Date;
  end: Date;
};

export type WindowOverrides = {
  start?: Date;
  end?: Date;
};

const HOUR_MS = 60 * 60 * 1000;

const assertValidDate = (name: string, value: Date) => {
  if (Number.isNaN(value.getTime())) {
    throw new InvalidWindowError(`Window ${name} is not a valid date`);
  }
};

/**
 * Next window to extract: starts at the last landed watermark (or `now - lookback`
 * on the first run) and ends now. Overrides replace either bound for backfills.
 */
export const resolveWindow = (args: {
  watermarkEnd?: Date;
  now: Date;
  initialLookbackHours: number;
  overrides?: WindowOverrides;
}): ExtractionWindow => {
  const { watermarkEnd, now, initialLookbackHours, overrides = {} } = args;

  const derivedStart = watermarkEnd ?? new Date(now.getTime() - initialLookbackHours * HOUR_MS);
  const start = overrides.start ?? derivedStart;
  const end = overrides.end ?? now;

  assertValidDate("start", start);
  assertValidDate("end", end);

  if (start.getTime() >= end.getTime()) {
    throw new InvalidWindowError(
      `Window start ${start.toISOString()} must be before end ${end.toISOString()}`
    );
  }

  return { start, end };
};

/** ISO-8601 basic form, safe inside object names: 2025-12-18T06:00:00.000Z -> 20251218T060000.000Z */
export const formatWindowBound = (value: Date): string => value.toISOString().replace(/[-:]/g, "");

export const windowKey = (window: ExtractionWindow): string =>
  `${formatWindowBound(window.start)}_${formatWindowBound(window.end)}`;

export const windowToJson = (window: ExtractionWindow) => ({
  start: window.start.toISOString(),
  end: window.end.toISOString()
});

export type WatermarkMove = "advance" | "behind_watermark" | "gap_after_watermark";

/**
 * Whether landing `window` may move the watermark to `window.end`. A window must
 * reach past the watermark and start at or before it; the watermark never jumps a gap.
 */
export const watermarkMoveFor = (window: ExtractionWindow, watermarkEnd?: Date): WatermarkMove => {
  if (watermarkEnd == null) return "advance";
  if (window.end.getTime() <= watermarkEnd.getTime()) return "behind_watermark";
  if (window.start.getTime() > watermarkEnd.getTime()) return "gap_after_watermark";
  return "advance";
};
