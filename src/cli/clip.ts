import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { ENV } from "../pipeline/env";
import { toVideoId } from "../pipeline/ids";
import { createServices } from "../pipeline/run";
import { requestClip } from "../pipeline/trim";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option("video", { type: "string", demandOption: true, describe: "Video ID or uploaded file path" })
    .option("start", { type: "number", demandOption: true, describe: "Clip start in seconds" })
    .option("end", { type: "number", demandOption: true, describe: "Clip end in seconds" })
    .parse();

  const services = createServices(ENV);
  const outPath = await requestClip(
    {
      trimmer: services.trimmer,
      uploadDir: ENV.uploadDir,
      outputDir: ENV.outputDir,
      allowedExtensions: ENV.allowedExtensions,
    },
    toVideoId(argv.video),
    argv.start,
    argv.end
  );
  console.log("Clip:", outPath);
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
