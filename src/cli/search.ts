import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { ENV } from "../pipeline/env";
import { toVideoId } from "../pipeline/ids";
import { findMedia, probeDuration } from "../pipeline/ingest";
import { policyFromConfig } from "../pipeline/range";
import { createServices } from "../pipeline/run";
import { searchTranscript } from "../pipeline/search";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option("video", { type: "string", demandOption: true, describe: "Video ID or uploaded file path" })
    .option("keyword", { type: "string", demandOption: true })
    .option("mode", { choices: ["span", "token"] as const, default: ENV.matchMode })
    .option("policy", { choices: ["exact", "padded"] as const, default: ENV.clipPolicy })
    .option("pad", { type: "number", default: ENV.clipPaddingSec, describe: "Seconds added on both sides (padded policy)" })
    .option("json", { type: "boolean", default: false })
    .parse();

  const videoId = toVideoId(argv.video);
  const services = createServices(ENV);
  const mediaPath = argv.policy === "padded" ? await findMedia(ENV.uploadDir, videoId, ENV.allowedExtensions) : null;
  const durationSec = mediaPath ? await probeDuration(mediaPath, ENV.ffprobeBin) : undefined;

  const result = await searchTranscript(services, videoId, argv.keyword, {
    mode: argv.mode,
    policy: policyFromConfig(argv.policy, argv.pad),
    durationSec,
  });

  if (argv.json) {
    console.log(JSON.stringify(result, null, 2));
    return;
  }
  if (!result.keyword.trim()) return;
  if (result.totalMatches === 0) {
    console.log(`"${result.keyword}" is not found in the transcript.`);
    return;
  }
  console.log(`Found ${result.totalMatches} match(es) for "${result.keyword}"`);
  for (const m of result.matches) {
    console.log(`${m.startLabel} - ${m.endLabel}  "${m.matchedText}"  [segment ${m.segmentIndex}]`);
    console.log(`    ${m.context.trim()}`);
    console.log(`    clip: --start ${m.range.start} --end ${m.range.end}`);
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
