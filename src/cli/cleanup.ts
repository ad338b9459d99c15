import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import path from 'path';
import { ENV } from '../pipeline/env';
import { cleanupOldFiles } from '../pipeline/cleanup';

/*
 * cleanup.ts - remove stale uploads, clips and temp files.
 * Prints the plan unless --yes is given.
 */
async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option('max-age-hours', { type: 'number', default: ENV.maxFileAgeHours })
    .option('transcripts', { type: 'boolean', default: false, describe: 'Also clean the transcript directory' })
    .option('yes', { type: 'boolean', default: false, describe: 'Confirm deletion' })
    .help()
    .parse();

  const dirs = [ENV.uploadDir, ENV.outputDir, ENV.tempDir];
  if (argv.transcripts) dirs.push(ENV.transcriptDir);

  console.log(`Cleanup plan (files older than ${argv['max-age-hours']}h):`);
  for (const d of dirs) console.log(' -', path.resolve(d));

  if (!argv.yes) {
    console.log('\nDry run only. Re-run with --yes to execute.');
    return;
  }

  let total = 0;
  for (const d of dirs) {
    total += await cleanupOldFiles(d, argv['max-age-hours']);
  }
  console.log(`Removed ${total} file(s).`);
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
