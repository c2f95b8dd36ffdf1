import fs from 'fs-extra';
import { FormatError } from './errors';
import { Fraction } from './fraction';
import type { PcmFormat } from './types';

// Single-chunk RIFF layout: "RIFF" size "WAVE" "fmt " 16 <fmt fields> "data" size <pcm>
export const WAV_HEADER_BYTES = 44;

const OFFSET_CHANNELS = 22;
const OFFSET_SAMPLE_RATE = 24;
const OFFSET_BYTES_PER_SECOND = 28;
const OFFSET_BITS_PER_SAMPLE = 34;

export interface SampleSource {
    readonly totalDuration: Fraction;
    readSamples(start: Fraction, duration: Fraction): Promise<Int16Array>;
}

export interface FrameRange {
    /** Absolute byte position in the file */
    offset: number;
    length: number;
}

export class WavContainer implements SampleSource {
    readonly totalDuration: Fraction;

    private constructor(
        readonly path: string,
        private fd: number | null,
        readonly fileSize: number,
        readonly channelCount: number,
        readonly sampleRate: number,
        readonly bytesPerSecond: number,
        readonly bytesPerSample: number
    ) {
        this.totalDuration = Fraction.of(fileSize - WAV_HEADER_BYTES, bytesPerSecond);
    }

    static async open(filePath: string): Promise<WavContainer> {
        const stat = await fs.stat(filePath);
        if (stat.size < WAV_HEADER_BYTES) {
            throw new FormatError(
                `${filePath} is ${stat.size} bytes; a WAV header needs ${WAV_HEADER_BYTES}`,
                { path: filePath, size: stat.size }
            );
        }
        const fd = await fs.open(filePath, 'r');
        try {
            const header = Buffer.alloc(WAV_HEADER_BYTES);
            await fs.read(fd, header, 0, WAV_HEADER_BYTES, 0);
            const channels = header.readUInt16LE(OFFSET_CHANNELS);
            const sampleRate = header.readUInt32LE(OFFSET_SAMPLE_RATE);
            const bytesPerSecond = header.readUInt32LE(OFFSET_BYTES_PER_SECOND);
            const bitsPerSample = header.readUInt16LE(OFFSET_BITS_PER_SAMPLE);
            if (bitsPerSample !== 16) {
                throw new FormatError(
                    `${filePath} declares ${bitsPerSample}-bit samples; only 16-bit signed PCM is supported`,
                    { path: filePath, bitsPerSample }
                );
            }
            if (channels === 0 || sampleRate === 0 || bytesPerSecond === 0) {
                throw new FormatError(`${filePath} has a degenerate WAV header`, {
                    path: filePath,
                    channels,
                    sampleRate,
                    bytesPerSecond,
                });
            }
            return new WavContainer(
                filePath,
                fd,
                stat.size,
                channels,
                sampleRate,
                bytesPerSecond,
                bitsPerSample / 8
            );
        } catch (e) {
            await fs.close(fd);
            throw e;
        }
    }

    get frameBytes(): number {
        return this.bytesPerSample * this.channelCount;
    }

    get format(): PcmFormat {
        return {
            sampleRate: this.sampleRate,
            channels: this.channelCount,
            bitsPerSample: this.bytesPerSample * 8,
        };
    }

    /** Byte range for `duration` seconds of audio starting at `start`, clamped to the last whole frame. */
    frameRange(start: Fraction, duration: Fraction): FrameRange {
        if (start.isNegative() || duration.isNegative()) {
            throw new RangeError(`Invalid read window start=${start} duration=${duration}`);
        }
        const startFrame = start.times(this.sampleRate).floor();
        const frames = duration.times(this.sampleRate).round();
        const offset = WAV_HEADER_BYTES + startFrame * this.frameBytes;
        const available = Math.max(0, this.fileSize - offset);
        const wholeFrames = Math.floor(available / this.frameBytes) * this.frameBytes;
        return { offset, length: Math.min(frames * this.frameBytes, wholeFrames) };
    }

    async readRawBytes(start: Fraction, duration: Fraction): Promise<Buffer> {
        if (this.fd === null) throw new Error(`${this.path} is closed`);
        const { offset, length } = this.frameRange(start, duration);
        const buf = Buffer.alloc(length);
        if (length === 0) return buf;
        const { bytesRead } = await fs.read(this.fd, buf, 0, length, offset);
        return buf.subarray(0, bytesRead);
    }

    /** Interleaved signed 16-bit samples, little-endian on disk. */
    async readSamples(start: Fraction, duration: Fraction): Promise<Int16Array> {
        const raw = await this.readRawBytes(start, duration);
        const samples = new Int16Array(Math.floor(raw.length / 2));
        for (let i = 0; i < samples.length; i++) {
            samples[i] = raw.readInt16LE(i * 2);
        }
        return samples;
    }

    async close(): Promise<void> {
        if (this.fd === null) return;
        const fd = this.fd;
        this.fd = null;
        await fs.close(fd);
    }
}

export function openWav(filePath: string): Promise<WavContainer> {
    return WavContainer.open(filePath);
}
