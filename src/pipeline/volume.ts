/**
 * Mean absolute sample value over a window, all channels together.
 *
 * This is not RMS or dBFS: the silence threshold is calibrated against this
 * exact measure. An empty window reads as 0.
 */
export function volume(samples: ArrayLike<number>): number {
    if (samples.length === 0) return 0;
    let sum = 0;
    for (let i = 0; i < samples.length; i++) {
        sum += Math.abs(samples[i]);
    }
    return sum / samples.length;
}
