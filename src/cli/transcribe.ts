import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import path from "path";
import { ENV } from "../pipeline/env";
import { MediaNotFoundError, TranscriptionFailedError } from "../pipeline/errors";
import { toVideoId } from "../pipeline/ids";
import { findMedia } from "../pipeline/ingest";
import { setLogFile } from "../pipeline/log";
import { createServices } from "../pipeline/run";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option("video", { type: "string", demandOption: true, describe: "Video ID or uploaded file path" })
    .option("language", { type: "string", default: ENV.whisperLanguage })
    .option("force", { type: "boolean", default: false, describe: "Transcribe again even if a transcript exists" })
    .parse();

  const videoId = toVideoId(argv.video);
  setLogFile(path.resolve(ENV.transcriptDir, "logs", `${videoId}-run-${Date.now()}.log`));
  const services = createServices(ENV);

  if (!argv.force && (await services.transcripts.has(videoId))) {
    console.log("Transcript:", services.transcripts.pathFor(videoId));
    return;
  }

  const mediaPath = await findMedia(ENV.uploadDir, videoId, ENV.allowedExtensions);
  if (!mediaPath) throw new MediaNotFoundError(videoId);

  const submitted = await services.registry.submit(videoId, mediaPath, argv.language);
  console.log(`Job ${videoId}: ${submitted.status}`);
  const job = await services.registry.wait(videoId);
  if (job?.status === "failed") throw new TranscriptionFailedError(videoId, job.reason);
  if (job?.status === "done") {
    console.log("Transcript:", job.transcriptPath);
    console.log(" - segments:", job.segmentCount);
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
