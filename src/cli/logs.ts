import fs from 'fs';
import path from 'path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { ENV } from '../pipeline/env';
import { isLogLevel, LEVEL_ORDER } from '../pipeline/log';

function tailFile(file: string, printChunk: (text: string) => void) {
  let size = fs.statSync(file).size;
  setInterval(() => {
    const stat = fs.statSync(file);
    if (stat.size > size) {
      const stream = fs.createReadStream(file, { start: size, end: stat.size - 1, encoding: 'utf8' });
      stream.on('data', (chunk) => printChunk(String(chunk)));
      size = stat.size;
    }
  }, 1500);
}

function latestRunLog(videoId: string): string | undefined {
  const dir = path.resolve(ENV.transcriptDir, 'logs');
  if (!fs.existsSync(dir)) return undefined;
  const prefix = `${videoId}-run-`;
  const candidates = fs
    .readdirSync(dir)
    .filter((f) => f.startsWith(prefix) && f.endsWith('.log'))
    .sort()
    .reverse();
  return candidates.length ? path.join(dir, candidates[0]) : undefined;
}

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option('video', { type: 'string', describe: 'Video ID whose latest transcription log to show' })
    .option('file', { type: 'string', describe: 'Explicit log file path' })
    .option('level', { type: 'string', default: 'debug', describe: 'Min level filter (debug|info|warn|error)' })
    .option('follow', { type: 'boolean', default: false, describe: 'Stream appended lines' })
    .check((a) => Boolean(a.video || a.file) || 'Provide --video or --file')
    .parse();

  const file = argv.file ?? (argv.video ? latestRunLog(argv.video) : undefined);
  if (!file) {
    console.error('No run log found for video', argv.video);
    process.exit(1);
  }
  if (!fs.existsSync(file)) {
    console.error('Log file does not exist:', file);
    process.exit(1);
  }
  const minOrder = isLogLevel(argv.level) ? LEVEL_ORDER[argv.level] : LEVEL_ORDER.debug;

  const printLine = (raw: string) => {
    const line = raw.trim();
    if (!line) return;
    let level: unknown;
    try {
      const obj: unknown = JSON.parse(line);
      level = typeof obj === 'object' && obj !== null && 'level' in obj ? obj.level : undefined;
    } catch {
      // not JSON: pass through
      process.stdout.write(line + '\n');
      return;
    }
    if (typeof level !== 'string' || !isLogLevel(level) || LEVEL_ORDER[level] >= minOrder) {
      process.stdout.write(line + '\n');
    }
  };

  fs.readFileSync(file, 'utf8').split(/\r?\n/).forEach(printLine);
  if (argv.follow) {
    tailFile(file, (text) => text.split(/\r?\n/).forEach(printLine));
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
