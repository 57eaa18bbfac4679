import { promises as fs } from "fs";
import Papa from "papaparse";
import { env } from "../src/config/env";
import {
    CustomerIntelligenceService,
    loadModelBundle
} from "../src/modules/intelligence";
import type { RawRecord } from "../src/modules/intelligence";
import { createLogger, setLogLevel } from "../src/utils/logger";

const logger = createLogger("score-csv");

async function main(): Promise<void> {
    setLogLevel(env.logLevel);
    const [inputPath, kind = "customers"] = process.argv.slice(2);
    if (!inputPath) {
        logger.error("Usage: score-csv <file.csv> [customers|transactions]");
        process.exit(1);
    }

    const models = await loadModelBundle(env.modelBundlePath);
    const intelligence = new CustomerIntelligenceService(models, {
        similarityTopK: env.similarityTopK,
        maxBatchSize: env.maxBatchSize
    });

    const text = await fs.readFile(inputPath, "utf-8");
    const parsed = Papa.parse<Record<string, string>>(text, {
        header: true,
        skipEmptyLines: "greedy"
    });
    if (parsed.errors.length) {
        logger.error("CSV could not be parsed", {
            errors: parsed.errors.slice(0, 5).map((error) => error.message)
        });
        process.exit(1);
    }
    const rows: RawRecord[] = parsed.data;

    const report =
        kind === "transactions"
            ? intelligence.scoreBatch(intelligence.aggregateTransactions(rows))
            : intelligence.scoreRawBatch(rows);

    logger.info("Scored batch", { ...report.summary });
    process.stdout.write(`${intelligence.exportCsv(report)}\n`);
}

main().catch((error) => {
    logger.error("score-csv failed", {
        error: error instanceof Error ? error.message : String(error)
    });
    process.exit(1);
});
