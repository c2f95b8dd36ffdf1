import { throwIfCancelled } from './errors';
import { Fraction } from './fraction';
import { volume } from './volume';
import type { SampleSource } from './wav';

export const DEFAULT_WINDOW = Fraction.of(1, 8);
export const DEFAULT_LOOKBACK_SEC = 20;
export const DEFAULT_THRESHOLD = 5;

export interface SilenceOptions {
    /** Analysis window length and search step */
    window?: Fraction;
    lookBackSec?: number;
    /** A window is silent when its volume is strictly below this */
    threshold?: number;
    signal?: AbortSignal;
}

export interface SilenceSearch {
    /** Earliest time the search may return; windows at or before it are not tried */
    after?: Fraction;
}

export class SilenceLocator {
    readonly window: Fraction;
    readonly threshold: number;
    /** Number of windows tried per search, counting the candidate's own */
    readonly maxSteps: number;
    private readonly signal?: AbortSignal;

    constructor(private readonly source: SampleSource, opts: SilenceOptions = {}) {
        this.window = opts.window ?? DEFAULT_WINDOW;
        this.threshold = opts.threshold ?? DEFAULT_THRESHOLD;
        this.signal = opts.signal;
        if (this.window.compare(Fraction.ZERO) <= 0) {
            throw new RangeError(`Silence window must be positive, got ${this.window}`);
        }
        const lookBack = Fraction.floorTo(opts.lookBackSec ?? DEFAULT_LOOKBACK_SEC, this.window);
        this.maxSteps = Math.max(0, lookBack.div(this.window).floor());
    }

    /** Candidate time snapped down to the window grid. */
    quantize(candidateSeconds: number): Fraction {
        return Fraction.floorTo(candidateSeconds, this.window);
    }

    /**
     * Nearest silent window at or before `candidateSeconds`, scanning backward
     * one window at a time. Returns null when none qualifies within the look-back.
     */
    async findSilenceBefore(candidateSeconds: number, search: SilenceSearch = {}): Promise<Fraction | null> {
        const anchor = this.quantize(candidateSeconds);
        for (let step = 0; step < this.maxSteps; step++) {
            throwIfCancelled(this.signal);
            const at = anchor.sub(this.window.times(step));
            if (at.isNegative()) break;
            if (search.after && at.compare(search.after) <= 0) break;
            // nothing to measure past the end of the audio
            if (at.compare(this.source.totalDuration) >= 0) continue;
            const samples = await this.source.readSamples(at, this.window);
            if (volume(samples) < this.threshold) return at;
        }
        return null;
    }
}
