function group(digits: string, sep: string): string {
  return digits.replace(/\B(?=(\d{3})+(?!\d))/g, sep);
}

/** 840000 -> 840'000 */
export function formatHeight(n: number): string {
  return n < 0 ? `-${group(String(-n), "'")}` : group(String(n), "'");
}

/** 1234567 -> 1,234,567 */
export function formatInt(n: number): string {
  return n < 0 ? `-${group(String(-n), ",")}` : group(String(n), ",");
}

export function formatBytes(b: number): string {
  if (b >= 1e9) return `${(b / 1e9).toFixed(1)} GB`;
  if (b >= 1e6) return `${(b / 1e6).toFixed(1)} MB`;
  if (b >= 1e3) return `${(b / 1e3).toFixed(1)} KB`;
  return `${b} B`;
}

const DIFFICULTY_UNITS: ReadonlyArray<readonly [number, string]> = [
  [1e18, "E"],
  [1e15, "P"],
  [1e12, "T"],
  [1e9, "G"],
];

export function formatDifficulty(d: number): string {
  for (const [scale, unit] of DIFFICULTY_UNITS) {
    if (d >= scale) return `${(d / scale).toFixed(2)} ${unit}`;
  }
  return d.toFixed(2);
}

const HASHRATE_UNITS: ReadonlyArray<readonly [number, string]> = [
  [1e21, "ZH/s"],
  [1e18, "EH/s"],
  [1e15, "PH/s"],
  [1e12, "TH/s"],
  [1e9, "GH/s"],
  [1e6, "MH/s"],
  [1e3, "kH/s"],
];

export function formatHashRate(h: number): string {
  for (const [scale, unit] of HASHRATE_UNITS) {
    if (h >= scale) return `${(h / scale).toFixed(2)} ${unit}`;
  }
  return `${h.toFixed(2)} H/s`;
}

/** Daemon fee rates come in BTC/kvB; 1 BTC/kvB = 100000 sat/vB. */
export function formatSatPerVb(btcPerKvb: number): string {
  return `${(btcPerKvb * 1e5).toFixed(1)} sat/vB`;
}

export function formatBtc(btc: number, precision = 8): string {
  return `${btc.toFixed(precision)} BTC`;
}

/** Elapsed seconds: `42s`, `3m 5s`, `2h 14m`. */
export function formatAge(secs: number): string {
  const s = Math.max(0, Math.floor(secs));
  if (s < 60) return `${s}s`;
  if (s < 3600) return `${Math.floor(s / 60)}m ${s % 60}s`;
  return `${Math.floor(s / 3600)}h ${Math.floor((s % 3600) / 60)}m`;
}

export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

export function formatTimeAgo(timestamp: number, now: number = nowSeconds()): string {
  const diff = now - timestamp;
  if (diff < 0) return "just now";
  if (diff < 60) return `${diff}s ago`;
  if (diff < 3600) return `${Math.floor(diff / 60)}m ago`;
  if (diff < 86400) return `${Math.floor(diff / 3600)}h ago`;
  return `${Math.floor(diff / 86400)}d ago`;
}

/** Keeps `head` leading and `tail` trailing characters of a hash or txid. */
export function abbreviateHash(hash: string, head = 20, tail = 20): string {
  if (hash.length <= head + tail) return hash;
  return `${hash.slice(0, head)}…${hash.slice(-tail)}`;
}

/** Shortens `s` to `max` characters, keeping both ends. */
export function truncateMiddle(s: string, max: number): string {
  if (s.length <= max) return s;
  const keep = Math.floor((max - 1) / 2);
  return `${s.slice(0, keep)}…${s.slice(s.length - keep)}`;
}

function pad2(v: number): string {
  return String(v).padStart(2, "0");
}

/** Local wall-clock `HH:MM:SS`. */
export function formatClock(ms: number): string {
  const d = new Date(ms);
  return `${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}`;
}

/** Unix seconds as local `YYYY-MM-DD HH:MM:SS`. */
export function formatDateTime(secs: number): string {
  const d = new Date(secs * 1000);
  return `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())} ${formatClock(secs * 1000)}`;
}
