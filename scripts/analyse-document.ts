import { readFile } from "fs/promises";
import { basename } from "path";
import { getConfig } from "../server/config";
import {
  createDefectEngine,
  getDefectEngine,
  loadClassifier,
  setDefectEngine,
  splitSentences,
  takeSentences,
  toDefectReport,
} from "../server/services/defect-detection";
import { defectsToCsv } from "../server/services/defect-export";
import { extractText } from "../server/services/text-extraction";

const USAGE = "Usage: tsx scripts/analyse-document.ts <file.pdf|file.docx|file.txt> [--csv]";

async function main() {
  const args = process.argv.slice(2);
  const asCsv = args.includes("--csv");
  const file = args.find(arg => !arg.startsWith("--"));

  if (!file) {
    console.error(USAGE);
    process.exit(1);
  }

  const config = getConfig();
  setDefectEngine(createDefectEngine({
    classifier: loadClassifier(config.CLASSIFIER_MODEL_PATH),
    options: {
      matchMode: config.MATCH_MODE,
      applySeverityQualifiers: config.APPLY_SEVERITY_QUALIFIERS,
      classifierWeight: config.CLASSIFIER_WEIGHT,
    },
  }));

  const buffer = await readFile(file);
  const document = await extractText(buffer, basename(file), { minTextLength: config.MIN_TEXT_LENGTH });
  const sentences = Array.from(takeSentences(splitSentences(document.text), config.MAX_SENTENCES));
  const result = getDefectEngine().analyzeSentences(document.filename, sentences);

  if (asCsv) {
    process.stdout.write(defectsToCsv(result.defects));
    return;
  }

  console.log(JSON.stringify(toDefectReport(result), null, 2));
  console.error(
    `${result.totalDefects} defect(s) in ${sentences.length} sentence(s), ` +
    `average confidence ${result.averageConfidence}, method ${result.processingMethod}`
  );
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
