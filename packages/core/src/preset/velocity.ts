import { VELOCITY_MAX } from '../config/constants';

export type VelocityRange = {
  start: number;
  end: number;
};

/**
 * Splits velocities 1..127 into `layers` contiguous bands, softest first.
 *
 * Band k spans floor(k·127/n)+1 .. floor((k+1)·127/n); the last band always
 * ends at 127 and each band starts right after the previous one ends.
 */
export function velocityRanges(layers: number): VelocityRange[] {
  if (layers <= 0) return [];

  const ranges: VelocityRange[] = [];
  for (let i = 0; i < layers; i++) {
    const start = Math.floor((i * VELOCITY_MAX) / layers) + 1;
    const end = i === layers - 1 ? VELOCITY_MAX : Math.floor(((i + 1) * VELOCITY_MAX) / layers);
    ranges.push({ start, end });
  }

  for (let i = 1; i < ranges.length; i++) {
    const prevEnd = ranges[i - 1].end;
    if (ranges[i].start !== prevEnd + 1) {
      ranges[i] = { start: prevEnd + 1, end: ranges[i].end };
    }
  }

  return ranges;
}
