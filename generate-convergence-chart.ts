import fs from 'fs/promises';
import path from 'path';
import { parseArgs } from 'util';

import { loadConvergence, renderConvergenceTex } from './src/utils/convergence';

async function main() {
    const { values, positionals } = parseArgs({
        allowPositionals: true,
        options: {
            output: { type: 'string' },
        },
    });

    const csvPath = positionals[0] ?? 'best_so_far.csv';
    const outputPath = values.output ?? path.join(path.dirname(csvPath), 'best_so_far_plot.tex');

    console.log(`Processing convergence data from ${csvPath}...`);
    const series = await loadConvergence(csvPath);

    await fs.writeFile(outputPath, renderConvergenceTex(series));

    console.log(`\nGenerated ${outputPath}`);
    console.log(`- ${series.points.length} points, early stop at iteration ${series.endedEarlyIteration}`);
}

main().catch(error => {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
});
