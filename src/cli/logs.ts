import fs from 'fs-extra';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { isLogLevel, LOG_LEVELS, passesLevel, type LogLevel } from '../pipeline/log';
import { latestRunLog } from '../pipeline/run';

function tailFile(file: string, min: LogLevel) {
  let size = fs.statSync(file).size;
  let pending = '';
  const timer = setInterval(() => {
    let next: number;
    try {
      next = fs.statSync(file).size;
    } catch (e) {
      clearInterval(timer);
      console.error('Stopped following', file, e);
      return;
    }
    if (next <= size) return;
    const stream = fs.createReadStream(file, { start: size, end: next - 1, encoding: 'utf8' });
    size = next;
    stream.on('data', (chunk) => {
      const lines = (pending + String(chunk)).split(/\r?\n/);
      pending = lines.pop() ?? '';
      lines.forEach((l) => printLine(l, min));
    });
  }, 1500);
}

function printLine(line: string, min: LogLevel) {
  line = line.trim();
  if (!line) return;
  if (passesLevel(line, min)) process.stdout.write(line + '\n');
}

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option('wav', { type: 'string', describe: 'Recording whose latest run log to show' })
    .option('file', { type: 'string', describe: 'Explicit log file path' })
    .option('level', { type: 'string', choices: LOG_LEVELS, default: 'debug', describe: 'Min level filter' })
    .option('follow', { type: 'boolean', default: false, describe: 'Stream appended lines' })
    .check((a) => Boolean(a.wav || a.file) || 'Provide --wav or --file')
    .parse();

  let file = argv.file;
  if (!file && argv.wav) {
    file = (await latestRunLog(argv.wav)) ?? undefined;
    if (!file) {
      console.error('No run-*.log found for', argv.wav);
      process.exit(1);
    }
  }
  if (!file || !(await fs.pathExists(file))) {
    console.error('Log file does not exist:', file);
    process.exit(1);
  }
  const min: LogLevel = isLogLevel(argv.level) ? argv.level : 'debug';
  const content = (await fs.readFile(file, 'utf8')).split(/\r?\n/);
  content.forEach((l) => printLine(l, min));
  if (argv.follow) {
    tailFile(file, min);
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
