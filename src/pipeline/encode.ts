import { execa } from 'execa';
import { ENV } from './env';
import { CancelledError, EncodeError } from './errors';
import { debug } from './log';
import type { PcmFormat, TrackMetadata } from './types';

export interface EncodeRequest {
    /** Raw interleaved little-endian signed PCM, exactly as stored in the WAV data chunk */
    pcm: Buffer;
    format: PcmFormat;
    tags: TrackMetadata;
    outPath: string;
    signal?: AbortSignal;
}

/** Turns one segment of raw PCM into a file. Rejects with EncodeError on failure. */
export interface Encoder {
    readonly name: string;
    encode(req: EncodeRequest): Promise<void>;
}

const TAG_FIELDS: ReadonlyArray<keyof TrackMetadata> = ['artist', 'album', 'title'];

export function flacArgs(req: Omit<EncodeRequest, 'pcm' | 'signal'>): string[] {
    const args: string[] = [];
    for (const field of TAG_FIELDS) {
        const value = req.tags[field].trim();
        if (value) args.push(`--tag=${field.toUpperCase()}=${value}`);
    }
    args.push(
        '--best',
        `--output-name=${req.outPath}`,
        '--sign=signed',
        `--channels=${req.format.channels}`,
        '--endian=little',
        `--bps=${req.format.bitsPerSample}`,
        `--sample-rate=${req.format.sampleRate}`,
        '--force-raw-format',
        '--silent',
        '-'
    );
    return args;
}

// A failed spawn or a broken stdin pipe leaves exitCode unset; the system error code names the cause.
function failureCause(res: object): string {
    if ('code' in res && typeof res.code === 'string') return res.code;
    if ('shortMessage' in res && typeof res.shortMessage === 'string') return res.shortMessage;
    return 'n/a';
}

/** Pipes raw PCM into the `flac` command line encoder. */
export class FlacEncoder implements Encoder {
    readonly name = 'flac';

    constructor(private readonly bin: string = ENV.flacBin) {}

    async encode(req: EncodeRequest): Promise<void> {
        const args = flacArgs(req);
        debug('encode.flac.spawn', { bin: this.bin, outPath: req.outPath, bytes: req.pcm.length });
        const res = await execa(this.bin, args, {
            input: req.pcm,
            reject: false,
            signal: req.signal,
        });
        if (res.isCanceled) {
            throw new CancelledError(`Encoding of ${req.outPath} cancelled`);
        }
        if (res.failed || res.exitCode !== 0) {
            const stderr = (res.stderr || '').slice(-800);
            throw new EncodeError(
                `${this.bin} failed for ${req.outPath} (exit ${res.exitCode ?? failureCause(res)})` +
                    (stderr ? `: ${stderr}` : ''),
                res.exitCode,
                stderr || undefined
            );
        }
    }
}
