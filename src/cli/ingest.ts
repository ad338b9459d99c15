import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { ENV } from "../pipeline/env";
import { ingestMedia } from "../pipeline/ingest";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option("file", { type: "string", demandOption: true, describe: "Media file to ingest" })
    .parse();

  const media = await ingestMedia(argv.file, {
    uploadDir: ENV.uploadDir,
    allowedExtensions: ENV.allowedExtensions,
    maxFileSizeBytes: ENV.maxFileSizeBytes,
    ffprobeBin: ENV.ffprobeBin,
  });
  console.log("Video ID:", media.videoId);
  console.log(" - file:", media.filePath);
  console.log(" - duration:", media.durationSec !== undefined ? `${media.durationSec.toFixed(1)}s` : "unknown");
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
