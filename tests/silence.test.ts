import fs from 'fs-extra';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { CancelledError } from '../src/pipeline/errors';
import { Fraction } from '../src/pipeline/fraction';
import { SilenceLocator } from '../src/pipeline/silence';
import { openWav, type WavContainer } from '../src/pipeline/wav';
import { makeTempDir, SAMPLE_RATE, toneFrames, writeWav } from './helpers/wav';

describe('SilenceLocator', () => {
  let dir: string;
  let gapAt5: WavContainer;
  let twoGaps: WavContainer;
  let silent: WavContainer;

  beforeAll(async () => {
    dir = await makeTempDir();
    gapAt5 = await openWav(
      await writeWav(dir, 'gap5.wav', {
        sampleRate: SAMPLE_RATE,
        channels: 1,
        samples: toneFrames(SAMPLE_RATE, 1, [
          { seconds: 5, amplitude: 800 },
          { seconds: 1, amplitude: 0 },
          { seconds: 34, amplitude: 800 },
        ]),
      })
    );
    // quiet-but-not-zero gap at 8-9 s, true silence at 2-3 s
    twoGaps = await openWav(
      await writeWav(dir, 'two.wav', {
        sampleRate: SAMPLE_RATE,
        channels: 2,
        samples: toneFrames(SAMPLE_RATE, 2, [
          { seconds: 2, amplitude: 500 },
          { seconds: 1, amplitude: 0 },
          { seconds: 5, amplitude: 500 },
          { seconds: 1, amplitude: 3 },
          { seconds: 3, amplitude: 500 },
        ]),
      })
    );
    silent = await openWav(
      await writeWav(dir, 'silent.wav', {
        sampleRate: SAMPLE_RATE,
        channels: 1,
        samples: new Int16Array(20 * SAMPLE_RATE),
      })
    );
  });

  afterAll(async () => {
    await Promise.all([gapAt5.close(), twoGaps.close(), silent.close()]);
    await fs.remove(dir);
  });

  it('tries 160 windows for a 20 s look-back', () => {
    expect(new SilenceLocator(silent).maxSteps).toBe(160);
  });

  it('quantizes the candidate down to the 1/8 s grid', async () => {
    const found = await new SilenceLocator(silent).findSilenceBefore(12.3);
    expect(found?.toString()).toBe('49/4');
  });

  it('returns the silent window closest to the candidate', async () => {
    const found = await new SilenceLocator(gapAt5).findSilenceBefore(25);
    expect(found?.toNumber()).toBe(5.875);
  });

  it('never looks back further than 20 s', async () => {
    const locator = new SilenceLocator(gapAt5);
    expect(await locator.findSilenceBefore(26)).toBeNull();
    expect(await locator.findSilenceBefore(25.9)).toBeNull();
  });

  it('stays within [candidate - 20 s, quantized candidate]', async () => {
    const locator = new SilenceLocator(gapAt5);
    for (const candidate of [6.3, 12.7, 20.05, 25.2]) {
      const found = await locator.findSilenceBefore(candidate);
      expect(found).not.toBeNull();
      const t = found?.toNumber() ?? NaN;
      expect(t).toBeGreaterThanOrEqual(candidate - 20);
      expect(t).toBeLessThanOrEqual(locator.quantize(candidate).toNumber());
    }
  });

  it('prefers the nearest qualifying window over the quietest', async () => {
    const found = await new SilenceLocator(twoGaps).findSilenceBefore(10);
    expect(found?.toNumber()).toBe(8.875);
  });

  it('compares strictly against the threshold', async () => {
    const found = await new SilenceLocator(twoGaps, { threshold: 3 }).findSilenceBefore(10);
    expect(found?.toNumber()).toBe(2.875);
  });

  it('does not scan before time zero', async () => {
    expect(await new SilenceLocator(gapAt5).findSilenceBefore(0.3)).toBeNull();
  });

  it('does not return windows at or before the lower limit', async () => {
    const locator = new SilenceLocator(twoGaps, { threshold: 3 });
    expect(await locator.findSilenceBefore(10, { after: Fraction.of(3) })).toBeNull();
    expect(await locator.findSilenceBefore(10, { after: Fraction.of(5, 2) })).toEqual(Fraction.of(23, 8));
  });

  it('honours a shorter look-back', async () => {
    const locator = new SilenceLocator(gapAt5, { lookBackSec: 2 });
    expect(locator.maxSteps).toBe(16);
    expect(await locator.findSilenceBefore(7.875)).toBeNull();
    expect(String(await locator.findSilenceBefore(7.75))).toBe('47/8');
  });

  it('is deterministic across repeated searches', async () => {
    const locator = new SilenceLocator(gapAt5);
    const a = await locator.findSilenceBefore(17.77);
    const b = await locator.findSilenceBefore(17.77);
    expect(a?.equals(b ?? Fraction.ZERO)).toBe(true);
  });

  it('stops when the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const locator = new SilenceLocator(gapAt5, { signal: controller.signal });
    await expect(locator.findSilenceBefore(25)).rejects.toBeInstanceOf(CancelledError);
  });
});
