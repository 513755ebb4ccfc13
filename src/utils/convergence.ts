import csv from 'csv-parser';
import fs from 'fs';
import z from 'zod';

import { MalformedInputError } from '../errors';

const convergenceRowSchema = z.object({
    iteration: z.string().transform(val => Number.parseInt(val)),
    new_best_so_far: z.string().transform(val => Number.parseFloat(val)),
    ended_early_iteration: z.string().transform(val => Number.parseInt(val)),
});

export interface ConvergencePoint {
    iteration: number;
    bestSoFar: number;
}

export interface ConvergenceSeries {
    points: ConvergencePoint[];
    endedEarlyIteration: number;
}

/** Turns raw `best_so_far.csv` rows into a series; the early-stop iteration comes from the first row */
export const parseConvergenceRows = (rows: ReadonlyArray<unknown>): ConvergenceSeries => {
    const parsed = convergenceRowSchema.array().safeParse(rows);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new MalformedInputError(`Invalid convergence row: ${issue.path.join('.')} ${issue.message}`);
    }

    const [first] = parsed.data;
    if (!first) {
        throw new MalformedInputError('Convergence file has no rows');
    }

    const points = parsed.data.map(row => ({ iteration: row.iteration, bestSoFar: row.new_best_so_far }));
    const invalidPoint = points.some(p => Number.isNaN(p.iteration) || Number.isNaN(p.bestSoFar));
    if (invalidPoint || Number.isNaN(first.ended_early_iteration)) {
        throw new MalformedInputError('Convergence file contains non-numeric values');
    }

    return { points, endedEarlyIteration: first.ended_early_iteration };
};

export const loadConvergence = (filePath: string): Promise<ConvergenceSeries> => {
    return new Promise((resolve, reject) => {
        const raw: unknown[] = [];

        fs.createReadStream(filePath)
            .on('error', error =>
                reject(new MalformedInputError(`Failed to read ${filePath}: ${error.message}`, { path: filePath })),
            )
            .pipe(csv({ mapValues: ({ value }) => String(value).trim() }))
            .on('data', (row: unknown) => raw.push(row))
            .on('error', reject)
            .on('end', () => {
                try {
                    resolve(parseConvergenceRows(raw));
                } catch (error) {
                    reject(error);
                }
            });
    });
};

/** pgfplots figure: best-so-far line plus a dashed vertical marker at the early-stop iteration */
export const renderConvergenceTex = ({ points, endedEarlyIteration }: ConvergenceSeries): string => {
    const coordinates = points.map(p => `(${p.iteration}, ${p.bestSoFar})`).join(' ');
    const yMin = '\\pgfkeysvalueof{/pgfplots/ymin}';
    const yMax = '\\pgfkeysvalueof{/pgfplots/ymax}';

    return `
% Best so far over iterations, with early stop marker
\\begin{figure}[hbt!]
\\centering
\\begin{tikzpicture}
    \\begin{axis}[
        xlabel={Iteration},
        ylabel={Best So Far},
        title={Best So Far Over Iterations with Early Stop Marker},
        grid=major,
        width=0.95\\linewidth,
        height=7cm,
        legend pos=north east
    ]

    \\addplot[color=blue, mark=*, thick] coordinates { ${coordinates} };
    \\addlegendentry{Best So Far}

    \\draw[red, dashed, thick] (axis cs:${endedEarlyIteration},${yMin}) -- (axis cs:${endedEarlyIteration},${yMax});
    \\addlegendimage{red, dashed, thick}
    \\addlegendentry{Early Stop (Iteration ${endedEarlyIteration})}

    \\end{axis}
\\end{tikzpicture}
\\caption{Best-so-far objective value per iteration.}
\\label{fig:best_so_far}
\\end{figure}
`;
};
