import fs from 'fs-extra';
import { z } from 'zod';
import { debug, info } from './log';
import type { TimestampEvent } from './types';

// One line of the now-playing log:
// {"time": 1700000000.25, "info": {"title": "...", "album": "...", "artist": "...", "status": "Playing"}}
export const TrackInfoSchema = z.object({
    title: z.string(),
    album: z.string(),
    artist: z.string(),
    status: z.string(),
});

export const TimestampLineSchema = z.object({
    time: z.number().finite(),
    info: TrackInfoSchema,
});

export type TimestampLine = z.infer<typeof TimestampLineSchema>;

export const PLAYING_STATUS = 'Playing';

export function toTimestampEvent(line: TimestampLine): TimestampEvent {
    const { title, album, artist, status } = line.info;
    return {
        time: line.time,
        title: `${artist}/${album}/${title}`,
        metadata: { artist, album, title },
        isPlaying: status === PLAYING_STATUS,
    };
}

/** Parses one log line; null for blank, malformed or incomplete lines. */
export function parseTimestampLine(line: string): TimestampEvent | null {
    const trimmed = line.trim();
    if (!trimmed) return null;
    let raw: unknown;
    try {
        raw = JSON.parse(trimmed);
    } catch {
        return null;
    }
    const parsed = TimestampLineSchema.safeParse(raw);
    return parsed.success ? toTimestampEvent(parsed.data) : null;
}

export interface ParsedTimestampLog {
    events: TimestampEvent[];
    /** Non-blank lines that could not be used */
    skipped: number;
}

export function parseTimestampLog(text: string): ParsedTimestampLog {
    const events: TimestampEvent[] = [];
    let skipped = 0;
    for (const line of text.split(/\r?\n/)) {
        if (!line.trim()) continue;
        const event = parseTimestampLine(line);
        if (event) events.push(event);
        else skipped++;
    }
    return { events, skipped };
}

export async function loadTimestampLog(filePath: string): Promise<TimestampEvent[]> {
    const text = await fs.readFile(filePath, 'utf8');
    const { events, skipped } = parseTimestampLog(text);
    if (skipped) debug('timestamps.skipped', { path: filePath, skipped });
    info('timestamps.load', { path: filePath, events: events.length });
    return events;
}
