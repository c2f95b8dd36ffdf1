/**
 * Formats seconds as [h:]mm:ss.cc, dropping empty leading units.
 * fmtTime(0) === "00.00", fmtTime(65.5) === "01:05.50", fmtTime(3725.1) === "1:02:05.10"
 */
export function fmtTime(seconds: number): string {
    const sign = seconds < 0 ? '-' : '';
    const totalCs = Math.round(Math.abs(seconds) * 100);
    const h = Math.floor(totalCs / 360000);
    const m = Math.floor((totalCs % 360000) / 6000);
    const s = Math.floor((totalCs % 6000) / 100);
    const cs = totalCs % 100;
    const parts: string[] = [];
    if (h) parts.push(String(h));
    if (m || h) parts.push(String(m).padStart(2, '0'));
    parts.push(`${String(s).padStart(2, '0')}.${String(cs).padStart(2, '0')}`);
    return sign + parts.join(':');
}
