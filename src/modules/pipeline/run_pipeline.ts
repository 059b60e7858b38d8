import "dotenv/config";
import { downloadPdfs } from "../converter/pdf.downloader";
import { ensureDatabaseExists } from "../vector-db/chroma.service";
import {
  getProcessingStatus,
  resolvePipelinePaths,
  runPipeline,
} from "./pipeline.service";

function readRootArg(argv: string[]): string | undefined {
  const index = argv.indexOf("--root");
  return index >= 0 ? argv[index + 1] : undefined;
}

// Everything after --download up to the next flag.
function readDownloadUrls(argv: string[]): string[] {
  const index = argv.indexOf("--download");
  if (index < 0) return [];
  const rest = argv.slice(index + 1);
  const end = rest.findIndex((arg) => arg.startsWith("--"));
  return end < 0 ? rest : rest.slice(0, end);
}

async function main() {
  const argv = process.argv.slice(2);
  const paths = resolvePipelinePaths(readRootArg(argv));

  if (argv.includes("--status")) {
    console.log(JSON.stringify(getProcessingStatus(paths), null, 2));
    return;
  }

  const urls = readDownloadUrls(argv);
  if (urls.length > 0) {
    await downloadPdfs(urls, paths.pdfDir);
  }

  await ensureDatabaseExists();
  const result = await runPipeline(paths);
  console.log(`Pipeline completed with status: ${result.status}`);
}

if (require.main === module) {
  main().catch((error) => {
    console.error("Pipeline failed:", error);
    process.exit(1);
  });
}
