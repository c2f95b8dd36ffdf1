import * as dotenv from 'dotenv';
dotenv.config();

function numberFromEnv(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const parsed = Number(raw);
    if (!Number.isFinite(parsed)) {
        throw new Error(`${name} must be a number, got ${JSON.stringify(raw)}`);
    }
    return parsed;
}

export const ENV = {
    // Each recording is written to <outRoot>/<basename>/NNNN.flac
    outRoot: process.env.OUT_ROOT || 'out',
    timestampsFile: process.env.TIMESTAMPS_FILE || 'track.log',
    // Optional: override flac binary name/path
    flacBin: process.env.FLAC_BIN || 'flac',
    logsRoot: process.env.LOGS_ROOT || 'logs',
    logLevel: process.env.LOG_LEVEL || 'info',
    // Mean absolute sample value (16-bit units) below which a window is silence
    silenceThreshold: numberFromEnv('SILENCE_THRESHOLD', 5),
    silenceLookBackSec: numberFromEnv('SILENCE_LOOKBACK_SEC', 20),
};
