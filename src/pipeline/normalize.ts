import { ConstraintViolation } from './errors';

export interface DurationBounds {
  minDurationSec: number;
  maxDurationSec: number;
}

export interface MomentWindow {
  startSec: number;
  endSec: number;
}

/** Loop the source repeatCount times, then cap the result at targetDurationSec. */
export interface ExtensionPlan {
  repeatCount: number;
  targetDurationSec: number;
}

export interface NormalizedWindow {
  startSec: number;
  durationSec: number;
  endSec: number;
  /** Source length after any extension; start + duration never exceeds it */
  sourceDurationSec: number;
  extension: ExtensionPlan | null;
}

function finite(n: number): boolean {
  return typeof n === 'number' && Number.isFinite(n);
}

function checkBounds(b: DurationBounds) {
  if (!finite(b.minDurationSec) || !finite(b.maxDurationSec) || b.minDurationSec <= 0 || b.maxDurationSec < b.minDurationSec) {
    throw new ConstraintViolation('Invalid platform duration bounds', { ...b });
  }
}

export function clampDuration(durationSec: number, b: DurationBounds): number {
  if (!finite(durationSec)) return b.minDurationSec;
  return Math.min(Math.max(durationSec, b.minDurationSec), b.maxDurationSec);
}

export function planExtension(sourceDurationSec: number, targetDurationSec: number): ExtensionPlan {
  return {
    repeatCount: Math.ceil(targetDurationSec / sourceDurationSec),
    targetDurationSec,
  };
}

/**
 * Fit a candidate window inside the platform bounds and the source.
 *
 * The duration is clamped first. Only a source shorter than the platform
 * minimum is extended by looping; a longer source keeps its length, the start
 * is shifted back and the duration is cut to what remains of the source.
 *
 * Running this on its own output returns the same window.
 */
export function normalizeMoment(
  moment: MomentWindow,
  videoDurationSec: number,
  bounds: DurationBounds
): NormalizedWindow {
  checkBounds(bounds);
  if (!finite(videoDurationSec) || videoDurationSec <= 0) {
    throw new ConstraintViolation('Source duration must be positive', { videoDurationSec });
  }
  if (!finite(moment.startSec) || !finite(moment.endSec)) {
    throw new ConstraintViolation('Candidate window has non-numeric bounds', { ...moment });
  }

  let durationSec = clampDuration(moment.endSec - moment.startSec, bounds);
  let startSec = Math.max(0, moment.startSec);
  let sourceDurationSec = videoDurationSec;
  let extension: ExtensionPlan | null = null;

  if (sourceDurationSec < bounds.minDurationSec) {
    extension = planExtension(sourceDurationSec, durationSec);
    sourceDurationSec = extension.targetDurationSec;
  }

  if (startSec + durationSec > sourceDurationSec) {
    startSec = Math.max(0, sourceDurationSec - durationSec);
  }
  durationSec = Math.min(durationSec, sourceDurationSec - startSec);

  if (durationSec < bounds.minDurationSec || durationSec > bounds.maxDurationSec) {
    throw new ConstraintViolation('Normalized duration falls outside platform bounds', {
      durationSec,
      ...bounds,
    });
  }

  return {
    startSec,
    durationSec,
    endSec: startSec + durationSec,
    sourceDurationSec,
    extension,
  };
}
