/**
 * Run a dispersed-city selection: run with: npx tsx scripts/select-cities.mts [cities.json|cities.csv] [options]
 *
 * Options:
 *   --n <count>               target selection size
 *   --min-distance <km>       separation floor
 *   --population-min <count>  catalog population floor
 *   --max-iterations <count>  repair replacement budget
 *
 * Without a file argument the catalog is read from the database (DATABASE_URL).
 */

import type { Kysely } from "kysely";
import { pino } from "pino";
import { env, selectionDefaults } from "../src/config/env.js";
import { createDb, type Database } from "../src/config/db.js";
import { fileCityCatalog, type CityCatalog } from "../services/catalog/city-catalog.js";
import { PostgresCityCatalog } from "../services/queries/catalog.query.js";
import { createLoggerSink } from "../services/selection/notices.js";
import { selectCities } from "../services/selection/selection.service.js";
import type { SelectionInput } from "../services/selection/types.js";

function elapsed(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}

function parseArgs(args: string[]): { file: string | null; input: SelectionInput } {
  const input: SelectionInput = {};
  let file: string | null = null;

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case "--n":
        input.nCities = Number(args[++i]);
        break;
      case "--min-distance":
        input.minDistanceKm = Number(args[++i]);
        break;
      case "--population-min":
        input.populationMin = Number(args[++i]);
        break;
      case "--max-iterations":
        input.maxRepairIterations = Number(args[++i]);
        break;
      default:
        if (args[i].startsWith("--")) throw new Error(`Unknown option ${args[i]}`);
        file = args[i];
    }
  }
  return { file, input };
}

async function main() {
  const t0 = performance.now();
  const { file, input } = parseArgs(process.argv.slice(2));
  const logger = pino({ level: env.LOG_LEVEL });

  let db: Kysely<Database> | null = null;
  let source: CityCatalog;
  if (file) {
    source = fileCityCatalog(file);
  } else {
    db = createDb();
    source = new PostgresCityCatalog(db);
  }

  try {
    const result = await selectCities(input, {
      catalog: source,
      sink: createLoggerSink(logger),
      defaults: selectionDefaults(env),
    });

    console.log(`\n✓ Selected ${result.cities.length} of ${result.requested} requested (pool: ${result.poolSize})`);
    for (const c of result.cities) {
      console.log(`  ${c.name.padEnd(28)} ${c.latitude.toFixed(4).padStart(9)} ${c.longitude.toFixed(4).padStart(10)}  pop ${c.population}`);
    }
    const closest = result.repair.closestPair;
    console.log(
      `\nRepair: ${result.repair.status} after ${result.repair.iterations} replacements` +
        (closest ? `, closest pair ${closest.ids.join(" / ")} at ${closest.distanceKm.toFixed(1)} km` : "")
    );
    if (result.warnings.length > 0) console.log(`Warnings: ${result.warnings.length}`);
  } finally {
    await db?.destroy();
  }
  console.log(`Total time: ${elapsed(performance.now() - t0)}`);
}

main().then(() => process.exit(0)).catch((e) => {
  console.error(e);
  process.exit(1);
});
