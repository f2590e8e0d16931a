// packages/cli/src/cli.ts
import { getFlag, positionals } from './flags';
import { resolveSide } from './config';
import { xy2d, d2xy, pathJson, writePath, render, check, formatCheck } from './commands';

const VALUE_FLAGS = ['n', 'out'];

export const USAGE = `Usage:
  # Cell to distance / distance to cell (default --n from $HILBERT_N or 16)
  npm run hilbert -- xy2d <x> <y> [--n 16]
  npm run hilbert -- d2xy <d> [--n 16]

  # Visit order as JSON [[x,y],...], printed or saved
  npm run hilbert -- path [--n 8] [--out artifacts/path.json]

  # ASCII drawing of the curve
  npm run hilbert -- render [--n 8]

  # Round trip, coverage and adjacency self-check
  npm run hilbert -- check [--n 64]
`;

/* ---------------- Main CLI ---------------- */
export function main(argv: string[]): number {
  const [mode, ...rest] = argv;
  const pos = positionals(rest, VALUE_FLAGS);

  try {
    if (mode === 'xy2d') {
      console.log(xy2d(resolveSide(rest), pos[0], pos[1]));
      return 0;
    }

    if (mode === 'd2xy') {
      console.log(d2xy(resolveSide(rest), pos[0]));
      return 0;
    }

    if (mode === 'path') {
      const n = resolveSide(rest);
      const out = getFlag(rest, 'out');
      if (out === undefined) {
        console.log(pathJson(n));
      } else {
        console.log(`Saved path (n=${n}) -> ${writePath(n, out)}`);
      }
      return 0;
    }

    if (mode === 'render') {
      for (const line of render(resolveSide(rest))) console.log(line);
      return 0;
    }

    if (mode === 'check') {
      const report = check(resolveSide(rest));
      console.log(formatCheck(report));
      return report.ok ? 0 : 1;
    }
  } catch (err) {
    console.error(`error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }

  console.log(USAGE);
  return mode === undefined || mode === 'help' || mode === '--help' ? 0 : 1;
}

if (require.main === module) {
  process.exitCode = main(process.argv.slice(2));
}
