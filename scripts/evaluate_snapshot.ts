
// scripts/evaluate_snapshot.ts
// Usage: npm run evaluate -- fixtures/sample_snapshot.json
//    or: ENGINE_SNAPSHOT_FILE=match.json npm run evaluate
import fs from 'fs';
import { loadConfigFromEnv, requireEnv } from '../engine/src/env';
import { evaluateRaw } from '../engine/src/evaluate';
import { explainReport } from '../engine/src/explain';

function main() {
    const { config } = loadConfigFromEnv();
    const file = process.argv[2] ?? requireEnv('ENGINE_SNAPSHOT_FILE');

    const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
    const report = evaluateRaw(raw, config);

    console.log(`⚽ Live markets for ${file}`);
    explainReport(report).forEach(line => console.log(line));

    if (report.failures.length > 0) {
        process.exitCode = 2;
    }
}

try {
    main();
} catch (err) {
    console.error('❌ Evaluation failed:', err instanceof Error ? err.message : err);
    process.exit(1);
}
