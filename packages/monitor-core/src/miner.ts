import { hexToBytes } from "@blocktop/rpc-sdk";

export const MINER_PLACEHOLDER = "—";

const MIN_RUN = 4;
const MAX_TAG = 24;
const SLASH = 0x2f;

/**
 * Pool tag from a coinbase scriptSig: the longest run of printable ASCII (slashes excluded)
 * of at least 4 bytes, cut to 24 characters. The first run wins a tie. A trailing odd nibble
 * is ignored.
 */
export function extractMinerTag(coinbaseHex: string): string {
  const even = coinbaseHex.length % 2 === 0 ? coinbaseHex : coinbaseHex.slice(0, -1);
  let best = "";
  let run = "";
  const closeRun = () => {
    if (run.length >= MIN_RUN && run.length > best.length) best = run;
    run = "";
  };
  for (const b of hexToBytes(even)) {
    if (b >= 0x20 && b < 0x7f && b !== SLASH) run += String.fromCharCode(b);
    else closeRun();
  }
  closeRun();
  return best ? best.slice(0, MAX_TAG) : MINER_PLACEHOLDER;
}
