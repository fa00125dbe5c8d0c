interface SniffResult {
  readonly encoding: string;
  readonly bomLength: number;
}

interface DecodeResult {
  readonly text: string;
  readonly encoding: string;
}

export interface StreamDecoder {
  readonly encoding: string | undefined;
  decode(chunk: Uint8Array): string;
  flush(): string;
}

const DEFAULT_ENCODING = "utf-8";

const ENCODING_ALIASES = new Map([
  ["utf8", "utf-8"],
  ["unicode-1-1-utf-8", "utf-8"],
  ["utf-16", "utf-16le"],
  ["ucs-2", "utf-16le"],
  ["unicode", "utf-16le"],
  ["latin1", "windows-1252"],
  ["iso-8859-1", "windows-1252"],
  ["ascii", "windows-1252"],
  ["us-ascii", "windows-1252"],
]);

function isSupportedEncoding(label: string): boolean {
  try {
    return new TextDecoder(label).encoding.length > 0;
  } catch {
    return false;
  }
}

/**
 * Maps a user-supplied encoding label to a label `TextDecoder` accepts.
 */
export function normalizeEncodingLabel(label: string | undefined): string | undefined {
  if (label == null) return;
  const s = label.trim().toLowerCase();
  if (!s) return;

  const aliased = ENCODING_ALIASES.get(s) ?? s;
  return isSupportedEncoding(aliased) ? aliased : undefined;
}

function sniffBOM(data: Uint8Array): { bomEnc: string | undefined; bomLength: number } {
  if (data.length >= 3 && data[0] === 0xef && data[1] === 0xbb && data[2] === 0xbf) {
    return { bomEnc: "utf-8", bomLength: 3 };
  }
  if (data.length >= 2) {
    if (data[0] === 0xff && data[1] === 0xfe) return { bomEnc: "utf-16le", bomLength: 2 };
    if (data[0] === 0xfe && data[1] === 0xff) return { bomEnc: "utf-16be", bomLength: 2 };
  }
  return { bomEnc: undefined, bomLength: 0 };
}

/**
 * Resolves the encoding of a BBCode byte stream from an explicit label, then the BOM.
 */
export function sniffBBCodeEncoding(
  data: Uint8Array,
  transportEncoding: string | undefined
): SniffResult {
  const { bomEnc, bomLength } = sniffBOM(data);
  const transport = normalizeEncodingLabel(transportEncoding);
  if (transport) {
    return { encoding: transport, bomLength: bomEnc === transport ? bomLength : 0 };
  }

  if (bomEnc) return { encoding: bomEnc, bomLength };
  return { encoding: DEFAULT_ENCODING, bomLength: 0 };
}

/**
 * Decodes BBCode bytes into text. The byte order mark is not part of the result.
 */
export function decodeBBCode(
  data: Uint8Array,
  transportEncoding?: string | undefined
): DecodeResult {
  const { encoding, bomLength } = sniffBBCodeEncoding(data, transportEncoding);
  const payload = bomLength ? data.subarray(bomLength) : data;

  return {
    text: new TextDecoder(encoding, { ignoreBOM: true }).decode(payload),
    encoding,
  };
}

/**
 * Creates a decoder for chunked input. The encoding is fixed by the first non-empty chunk.
 */
export function createStreamDecoder(transportEncoding?: string | undefined): StreamDecoder {
  let decoder: InstanceType<typeof TextDecoder> | undefined;
  let encoding: string | undefined;

  return {
    get encoding() {
      return encoding;
    },

    decode(chunk: Uint8Array): string {
      if (!chunk.length) return "";

      let payload = chunk;
      if (!decoder) {
        const sniffed = sniffBBCodeEncoding(chunk, transportEncoding);
        encoding = sniffed.encoding;
        decoder = new TextDecoder(encoding, { ignoreBOM: true });
        payload = chunk.subarray(sniffed.bomLength);
      }

      return decoder.decode(payload, { stream: true });
    },

    flush(): string {
      return decoder ? decoder.decode() : "";
    },
  };
}
