import { CancelledError, type MissingBoundary, throwIfCancelled } from './errors';
import { Fraction } from './fraction';
import { debug, info, startStep, warn } from './log';
import { SilenceLocator, type SilenceOptions } from './silence';
import { fmtTime } from './time';
import type { TimestampEvent, TrackSegment } from './types';
import type { SampleSource } from './wav';

export type SegmentationOutcome =
    | {
          status: 'complete';
          segments: TrackSegment[];
          /** Unix time of the first playing event, used as the recording's zero */
          origin: number;
          /** origin − hint */
          startAdjustment: number;
      }
    | {
          status: 'aborted';
          missing: MissingBoundary[];
          origin: number;
          startAdjustment: number;
      }
    | { status: 'unaligned'; hint: number };

/** Index of the first event with time >= `time` (events sorted by time). */
export function lowerBound(events: readonly TimestampEvent[], time: number): number {
    let lo = 0;
    let hi = events.length;
    while (lo < hi) {
        const mid = (lo + hi) >>> 1;
        if (events[mid].time < time) lo = mid + 1;
        else hi = mid;
    }
    return lo;
}

interface ClosedSpan {
    start: Fraction;
    end: Fraction;
    event: TimestampEvent;
}

/**
 * Places a track boundary at the nearest silence before each "Playing" event.
 *
 * The first playing event at or after `hint` becomes time zero of the
 * recording; later events are measured from it. Each boundary closes the
 * previous track, which keeps the previous event's metadata. An event past the
 * end of the audio, or running out of events, closes the last track at the end
 * of the file. If any boundary has no silence the outcome is `aborted` and no
 * segments are returned.
 */
export async function segmentTracks(
    source: SampleSource,
    events: readonly TimestampEvent[],
    hint: number,
    opts: SilenceOptions = {}
): Promise<SegmentationOutcome> {
    const locator = new SilenceLocator(source, opts);
    const total = source.totalDuration;
    const totalSec = total.toNumber();
    const begin = lowerBound(events, hint);

    let origin: number | null = null;
    let openStart = Fraction.ZERO;
    let openEvent: TimestampEvent | null = null;
    const closed: ClosedSpan[] = [];
    const missing: MissingBoundary[] = [];

    const timer = startStep('split.segment', { events: events.length - begin, durationSec: totalSec });
    try {
        for (let i = begin; i < events.length; i++) {
            const event = events[i];
            if (!event.isPlaying) continue;
            throwIfCancelled(opts.signal);

            if (origin === null) {
                origin = event.time;
                info('split.align', { hint, origin, adjustSec: Number((origin - hint).toFixed(2)) });
            }
            const at = event.time - origin;
            debug('split.event', { at: fmtTime(at), title: event.title });

            if (at > totalSec) {
                info('split.eof', { at: fmtTime(at), title: event.title });
                break;
            }

            if (openEvent !== null) {
                const silence = await locator.findSilenceBefore(at, { after: openStart });
                if (silence) {
                    info('split.boundary', {
                        at: fmtTime(silence.toNumber()),
                        deltaSec: Number((silence.toNumber() - at).toFixed(2)),
                        title: event.title,
                    });
                    closed.push({ start: openStart, end: silence, event: openEvent });
                    openStart = silence;
                } else {
                    warn('split.boundary.missing', { at: fmtTime(at), title: event.title });
                    missing.push({ at, title: event.title });
                }
            }
            openEvent = event;
            timer.eta(i - begin + 1, events.length - begin);
        }
    } catch (e) {
        timer.end({ status: e instanceof CancelledError ? 'cancelled' : 'failed' });
        throw e;
    }

    if (origin === null || openEvent === null) {
        timer.end({ status: 'unaligned' });
        return { status: 'unaligned', hint };
    }
    const startAdjustment = origin - hint;
    if (missing.length) {
        timer.end({ status: 'aborted', missing: missing.length });
        return { status: 'aborted', missing, origin, startAdjustment };
    }

    closed.push({ start: openStart, end: total, event: openEvent });
    const segments: TrackSegment[] = closed.map((span, i) => ({
        index: i + 1,
        start: span.start,
        duration: span.end.sub(span.start).ceilTo(locator.window),
        title: span.event.title,
        metadata: span.event.metadata,
    }));
    timer.end({ status: 'complete', segments: segments.length });
    return { status: 'complete', segments, origin, startAdjustment };
}
