#!/usr/bin/env npx tsx
/**
 * mesh-recover CLI: convert .mesh assets to Wavefront OBJ
 *
 * Usage:
 *   npx tsx scripts/cli.ts <command> [args...]
 *
 * Commands:
 *   convert <file|dir...> [options]   Decode every .mesh and write <name>.obj
 *       -o, --output <dir>    Output directory (default: config outputDir)
 *       --no-uv               Omit vt records and use plain face references
 *       --max-iter <n>        Index search cap (candidate offsets)
 *       --step <n>            Index search stride in bytes
 *       --config <path>       Settings file (default: ./mesh-recover.json)
 *       --defs <path>         MeshDefs.lua metadata table (default: ./MeshDefs.lua if present)
 *       --lz4 <path>          liblz4 shared library to load
 *       --mode <m>            hybrid (default), body or legacy strategy set
 *       --debug               Print strategy traces
 *       --no-report           Skip the conversion-result_*.txt report
 *   info <file>               Header hexdump and layout candidate gate results
 *   scan <file>               Decode with a full trace, write nothing
 *   lz4 [path]                Locate, load and self-test liblz4
 */

import { readFileSync, existsSync, readdirSync, statSync } from 'fs';
import { join, resolve, basename, extname } from 'path';
import { processFiles, assetName } from '../src/core/batch';
import { applyOverrides, loadConfig, type DecoderConfig } from '../src/core/config';
import { CodecUnavailableError } from '../src/core/errors';
import {
  allLayoutCandidates,
  hasStructuredMagic,
  readCompressedBlock,
  readLodCount,
  stripNamePrefix,
  STRUCTURED_BONE_FLAG_OFFSET,
} from '../src/core/layouts';
import { findLz4Candidates } from '../src/core/lib-detect';
import { closeLogger, debug, error, getLogPath, initLogger, log } from '../src/core/logger';
import { decodeMesh } from '../src/core/mesh-decoder';
import { hintsForAsset, loadMeshDefs, resolveMeshDefsPath, type MeshDef } from '../src/core/mesh-defs';
import { decompressBlock, openLz4Codec, type Lz4Codec } from '../src/core/lz4';
import { formatSummary, writeReport } from '../src/core/report';
import { STRATEGY_MODES, strategiesForMode } from '../src/core/strategies';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}

function hexdump(data: Buffer, maxRows = 16): void {
  const rows = Math.min(maxRows, Math.ceil(data.length / 16));
  for (let row = 0; row < rows; row++) {
    const off = row * 16;
    const bytes = data.subarray(off, Math.min(off + 16, data.length));
    const hex: string[] = [];
    for (let i = 0; i < 16; i++) {
      hex.push(i < bytes.length ? bytes[i].toString(16).padStart(2, '0') : '  ');
    }
    let ascii = '';
    for (let i = 0; i < bytes.length; i++) {
      const b = bytes[i];
      ascii += (b >= 0x20 && b <= 0x7e) ? String.fromCharCode(b) : '.';
    }
    console.log(
      `  ${off.toString(16).padStart(8, '0')}  ${hex.slice(0, 8).join(' ')}  ${hex.slice(8).join(' ')}  |${ascii}|`
    );
  }
  if (data.length > maxRows * 16) {
    console.log(`  ... ${formatSize(data.length - maxRows * 16)} remaining`);
  }
}

function hex(n: number): string {
  return `0x${n.toString(16)}`;
}

/** Thrown by `die`; main reports it and exits non-zero after the log is flushed. */
class CliExit extends Error {}

function die(msg: string): never {
  throw new CliExit(msg);
}

function positiveInt(flag: string, value: string | undefined): number {
  const n = value === undefined ? NaN : parseInt(value, 10);
  if (!Number.isInteger(n) || n < 1) die(`${flag} expects a positive integer`);
  return n;
}

/** Expand directories to the .mesh files directly inside them. */
function collectMeshFiles(inputs: string[]): string[] {
  const files: string[] = [];
  for (const input of inputs) {
    const p = resolve(input);
    if (!existsSync(p)) die(`Not found: ${input}`);
    if (statSync(p).isDirectory()) {
      for (const name of readdirSync(p).sort()) {
        if (extname(name).toLowerCase() === '.mesh') files.push(join(p, name));
      }
    } else {
      files.push(p);
    }
  }
  return files;
}

/**
 * Load liblz4 once for the whole run. An explicit path is tried alone;
 * otherwise discovered copies come first, then the loader's search path.
 */
function openCodec(explicit: string | null): Lz4Codec {
  try {
    return explicit ? openLz4Codec([explicit], false) : openLz4Codec(findLz4Candidates());
  } catch (e) {
    if (e instanceof CodecUnavailableError) {
      die(`${e.message}\nInstall liblz4 (e.g. apt install liblz4-1, brew install lz4, pkg install liblz4) or pass --lz4 <path>.`);
    }
    throw e;
  }
}

function loadDefs(configured: string | null): Map<string, MeshDef> {
  const path = resolveMeshDefsPath(configured);
  if (!path) return new Map();
  const defs = loadMeshDefs(path);
  log(`Metadata: ${defs.size} mesh definitions from ${path}`);
  return defs;
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

interface ConvertArgs {
  inputs: string[];
  configPath?: string;
  debug: boolean;
  overrides: Partial<DecoderConfig>;
}

function parseConvertArgs(args: string[]): ConvertArgs {
  const parsed: ConvertArgs = { inputs: [], debug: false, overrides: {} };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '-o':
      case '--output':
        if (!args[i + 1]) die(`${arg} expects a directory`);
        parsed.overrides.outputDir = args[++i];
        break;
      case '--no-uv':
        parsed.overrides.exportUvs = false;
        break;
      case '--max-iter':
        parsed.overrides.maxIndexIterations = positiveInt(arg, args[++i]);
        break;
      case '--step':
        parsed.overrides.indexSearchStep = positiveInt(arg, args[++i]);
        break;
      case '--config':
        if (!args[i + 1]) die('--config expects a path');
        parsed.configPath = args[++i];
        break;
      case '--defs':
        if (!args[i + 1]) die('--defs expects a path');
        parsed.overrides.metadataPath = args[++i];
        break;
      case '--lz4':
        if (!args[i + 1]) die('--lz4 expects a path');
        parsed.overrides.lz4LibraryPath = args[++i];
        break;
      case '--mode': {
        const mode = STRATEGY_MODES.find(m => m === args[i + 1]);
        if (!mode) die(`--mode expects one of ${STRATEGY_MODES.join(', ')}`);
        parsed.overrides.mode = mode;
        i++;
        break;
      }
      case '--debug':
        parsed.debug = true;
        break;
      case '--no-report':
        parsed.overrides.writeReport = false;
        break;
      default:
        if (arg.startsWith('-')) die(`Unknown option: ${arg}`);
        parsed.inputs.push(arg);
    }
  }

  return parsed;
}

function cmdConvert(args: string[]): void {
  const parsed = parseConvertArgs(args);
  if (parsed.inputs.length === 0) die('Usage: convert <file|dir...> [options]');

  const config = applyOverrides(loadConfig(parsed.configPath), parsed.overrides);
  if (config.logDir) initLogger(config.logDir);

  const files = collectMeshFiles(parsed.inputs);
  if (files.length === 0) die('No .mesh files found');

  const codec = openCodec(config.lz4LibraryPath);
  log(`LZ4: ${codec.name} (${codec.version()})`);
  const defs = loadDefs(config.metadataPath);
  log(`Converting ${files.length} file(s) into ${resolve(config.outputDir)}`);

  const results = processFiles(files, {
    codec,
    config,
    defs,
    trace: parsed.debug ? debug : undefined,
  });

  console.log('\n' + formatSummary(results));
  if (config.writeReport) {
    log(`Report: ${writeReport(config.outputDir, results)}`);
  }
  if (getLogPath()) log(`Log: ${getLogPath()}`);
}

function cmdInfo(filepath: string): void {
  console.log(`\n=== Mesh Info: ${basename(filepath)} ===\n`);

  const data = readFileSync(filepath);
  console.log(`Size:       ${formatSize(data.length)}`);
  console.log(`Magic 0x1F: ${hasStructuredMagic(data) ? 'yes' : 'no'}`);
  if (data.length >= STRUCTURED_BONE_FLAG_OFFSET + 2) {
    console.log(`Bone flag:  ${data.readUInt16LE(STRUCTURED_BONE_FLAG_OFFSET)}`);
  }
  const stripped = stripNamePrefix(data);
  if (stripped) {
    console.log(`Name block: ${data.length - stripped.length} bytes (${data.subarray(4, data.length - stripped.length - 1).toString('latin1')})`);
  }

  console.log(`\nHeader:`);
  hexdump(data.subarray(0, 0x100));

  console.log(`\nLayout candidates:`);
  console.log(`  ${'ID'.padEnd(20)} ${'Sizes'.padEnd(12)} ${'Payload'.padEnd(8)} ${'Gate'}`);
  for (const c of allLayoutCandidates()) {
    const block = readCompressedBlock(data, c);
    const sizes = `${hex(c.compressedSizeOffset)}/${hex(c.uncompressedSizeOffset)}`;
    const gate = block
      ? `pass  ${block.compressed.length} -> ${block.uncompressedSize}`
      : 'fail';
    const lods = readLodCount(data, c);
    console.log(`  ${c.id.padEnd(20)} ${sizes.padEnd(12)} ${hex(c.payloadOffset).padEnd(8)} ${gate}${lods !== null && block ? `  lods=${lods}` : ''}`);
  }
}

function cmdScan(args: string[]): void {
  const parsed = parseConvertArgs(args);
  const [file] = parsed.inputs;
  if (!file) die('Usage: scan <file> [--defs path] [--lz4 path] [--max-iter n] [--step n] [--mode m]');

  const config = applyOverrides(loadConfig(parsed.configPath), parsed.overrides);
  const filepath = resolve(file);
  const codec = openCodec(config.lz4LibraryPath);
  const hints = hintsForAsset(assetName(filepath), loadDefs(config.metadataPath));

  console.log(`\n=== Scan: ${basename(filepath)} ===`);
  console.log(`Hints: zipPositions=${hints.zipPositions} compressed=${hints.compressed}\n`);

  const outcome = decodeMesh(readFileSync(filepath), {
    codec,
    hints,
    minVertexCount: config.minVertexCount,
    search: {
      step: config.indexSearchStep,
      maxIterations: config.maxIndexIterations,
      zeroRatioThreshold: config.zeroRatioThreshold,
    },
    trace: msg => console.log(`  ${msg}`),
    strategies: strategiesForMode(config.mode),
  });

  console.log(`\nAttempts:`);
  for (const a of outcome.attempts) {
    const status = a.ok ? 'ok' : a.errorKind ?? 'skipped';
    console.log(`  ${a.strategy.padEnd(18)} ${status}${a.message ? `  ${a.message}` : ''}`);
  }

  if (outcome.ok) {
    const { mesh } = outcome;
    console.log(`\nDecoded via ${outcome.strategy}: ${mesh.vertexCount} vertices, ${mesh.faceCount} faces`);
  } else {
    console.log(`\n${outcome.error}: ${outcome.message}`);
    process.exitCode = 1;
  }
}

/** A single literal-only LZ4 sequence: token high nibble = literal count. */
const SELF_TEST_TEXT = 'mesh-recover';
const SELF_TEST_BLOCK = Buffer.concat([
  Buffer.from([SELF_TEST_TEXT.length << 4]),
  Buffer.from(SELF_TEST_TEXT, 'latin1'),
]);

function cmdLz4(explicit: string | undefined): void {
  console.log(`\n=== LZ4 Library Scan ===\n`);

  const candidates = explicit ? [resolve(explicit)] : findLz4Candidates();
  if (candidates.length === 0) {
    console.log('No liblz4 files found in the searched directories; trying the loader search path.');
  }
  for (const p of candidates) console.log(`  Found: ${p}`);

  const codec = openCodec(explicit ? resolve(explicit) : null);
  console.log(`\n  Loaded: ${codec.name} (version ${codec.version()})`);

  const out = decompressBlock(codec, SELF_TEST_BLOCK, SELF_TEST_BLOCK.length, SELF_TEST_TEXT.length);
  console.log(`  Self-test: ${out.toString('latin1') === SELF_TEST_TEXT ? 'OK' : 'FAILED (output mismatch)'}`);
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

const [command, ...args] = process.argv.slice(2);

if (!command) {
  console.log('mesh-recover CLI');
  console.log('');
  console.log('Commands:');
  console.log('  convert <file|dir...> [-o dir] [--no-uv] [--max-iter N] [--step N]');
  console.log('          [--config path] [--defs path] [--lz4 path] [--mode hybrid|body|legacy]');
  console.log('          [--debug] [--no-report]');
  console.log('  info <file>       Header hexdump and layout candidate gate results');
  console.log('  scan <file>       Decode with a full trace, write nothing');
  console.log('  lz4 [path]        Locate, load and self-test liblz4');
  process.exit(0);
}

try {
  switch (command) {
    case 'convert':
      cmdConvert(args);
      break;

    case 'info':
      if (!args[0]) die('Usage: info <file>');
      cmdInfo(resolve(args[0]));
      break;

    case 'scan':
      cmdScan(args);
      break;

    case 'lz4':
      cmdLz4(args[0]);
      break;

    default:
      die(`Unknown command: ${command}`);
  }
} catch (e) {
  if (e instanceof CliExit) {
    error(`Error: ${e.message}`);
  } else {
    error('FATAL', e);
  }
  process.exitCode = 1;
}

await closeLogger();
