import * as fs from "fs";
import * as path from "path";
import { DocxExporter, ErrorCollector, parseShelf } from "./exporter";

// Usage: export-shelf.ts [shelf.json] [template.docx]
async function main() {
  const shelfPath = process.argv[2] || path.join(__dirname, "fixtures", "sample-shelf.json");
  const templatePath = process.argv[3];

  if (!fs.existsSync(shelfPath)) {
    console.error(`File not found: ${shelfPath}`);
    process.exit(1);
  }

  console.log(`Loading shelf: ${shelfPath}...`);
  const shelf = parseShelf(JSON.parse(fs.readFileSync(shelfPath, "utf8")));
  const template = templatePath ? fs.readFileSync(templatePath) : undefined;

  const errors = new ErrorCollector();
  const exporter = new DocxExporter(shelf, { template, errors, includeTableOfContents: true });
  const buffer = await exporter.render();

  const outputDir = path.join(__dirname, "output");
  fs.mkdirSync(outputDir, { recursive: true });
  const outputPath = path.join(outputDir, `${path.basename(shelfPath, ".json")}.docx`);
  fs.writeFileSync(outputPath, buffer);

  console.log(`\n✅ Exported ${buffer.length} bytes to: ${outputPath}`);
  console.log(`Body elements: ${exporter.document.body.length}`);
  console.log(`Recovered errors: ${errors.count}`);
  errors.errors.forEach((error, idx) => {
    console.log(`  ${idx + 1}. [${error.kind}] ${error.blockKey ?? "-"} ${error.message}`);
  });
}

main().catch(console.error);
