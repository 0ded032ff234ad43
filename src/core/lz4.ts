/**
 * LZ4 block decompression wrapper
 *
 * Uses koffi to call LZ4_decompress_safe from the system liblz4 at runtime.
 * The mesh payloads are raw LZ4 *blocks* (no frame header), so the expected
 * decompressed size always comes from the asset header.
 *
 * The engine only talks to the BlockCodec interface; Lz4Codec is the
 * production binding and tests substitute an in-process codec.
 */

import { createRequire } from 'module';
import { CodecUnavailableError, DecodeError } from './errors';

const require = createRequire(import.meta.url);
const koffi: typeof import('koffi') = require('koffi');

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

type Lz4DecompressSafeFn = (
  src: Buffer,
  dst: Buffer,
  compressedSize: number,
  dstCapacity: number,
) => number;

type Lz4VersionFn = () => number;

/**
 * The native primitive: decompress `src` into `dst`, returning the number of
 * bytes written, or a value <= 0 on failure.
 */
export interface BlockCodec {
  readonly name: string;
  decompress(src: Buffer, dst: Buffer): number;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Library names tried through the dynamic loader's own search path. */
export const LZ4_SONAMES: Record<string, string[]> = {
  linux: ['liblz4.so.1', 'liblz4.so'],
  android: ['liblz4.so'],
  darwin: ['liblz4.1.dylib', 'liblz4.dylib'],
  win32: ['liblz4.dll', 'lz4.dll'],
};

// ---------------------------------------------------------------------------
// Class
// ---------------------------------------------------------------------------

export class Lz4Codec implements BlockCodec {
  readonly name: string;
  private decompressFn: Lz4DecompressSafeFn;
  private versionFn: Lz4VersionFn;

  /**
   * Load liblz4 from the given path (or soname) and bind the block
   * decompressor. Throws if the library cannot be loaded.
   */
  constructor(libPath: string) {
    const lib = koffi.load(libPath);
    this.name = libPath;

    this.decompressFn = lib.func(
      'int LZ4_decompress_safe(void* src, void* dst, int compressedSize, int dstCapacity)',
    );
    this.versionFn = lib.func('int LZ4_versionNumber()');
  }

  decompress(src: Buffer, dst: Buffer): number {
    return this.decompressFn(src, dst, src.length, dst.length);
  }

  /** Library version as "major.minor.release". */
  version(): string {
    const v = this.versionFn();
    return `${Math.floor(v / 10000)}.${Math.floor(v / 100) % 100}.${v % 100}`;
  }
}

/**
 * Open the first loadable liblz4 among `paths`, falling back to the platform
 * sonames. Throws CodecUnavailableError when nothing loads; callers treat that
 * as fatal before any file is decoded.
 */
export function openLz4Codec(paths: string[], includeSonames = true): Lz4Codec {
  const attempted: string[] = [];
  const names = includeSonames ? [...paths, ...(LZ4_SONAMES[process.platform] ?? ['liblz4.so'])] : paths;

  const reasons: string[] = [];
  for (const p of names) {
    attempted.push(p);
    try {
      return new Lz4Codec(p);
    } catch (e) {
      reasons.push(`${p}: ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  throw new CodecUnavailableError(
    `Unable to load LZ4 library${reasons.length ? `\n  ${reasons.join('\n  ')}` : ' (no candidates)'}`,
    attempted,
  );
}

// ---------------------------------------------------------------------------
// Adapter
// ---------------------------------------------------------------------------

/**
 * Decompress one block and enforce the size contract: the codec must report a
 * positive length equal to `expectedSize`. No retries happen here.
 */
export function decompressBlock(
  codec: BlockCodec,
  src: Buffer,
  compressedSize: number,
  expectedSize: number,
): Buffer {
  if (compressedSize > src.length) {
    throw new DecodeError(
      'DecompressionFailure',
      `compressed size ${compressedSize} exceeds available ${src.length} bytes`,
    );
  }

  const dst = Buffer.alloc(expectedSize);
  const written = codec.decompress(src.subarray(0, compressedSize), dst);

  if (written <= 0) {
    throw new DecodeError('DecompressionFailure', `${codec.name} returned ${written}`);
  }
  if (written !== expectedSize) {
    throw new DecodeError(
      'DecompressionFailure',
      `${codec.name} produced ${written} bytes, expected ${expectedSize}`,
    );
  }

  return dst;
}
