import { DEFAULT_SIDE } from '@hilbert/shared';
import { getFlag, parseIntArg } from './flags';

/** Grid order when --n is absent: $HILBERT_N, else DEFAULT_SIDE. */
export function defaultSide(env: NodeJS.ProcessEnv = process.env): number {
  const raw = env.HILBERT_N;
  if (raw === undefined || raw.trim() === '') return DEFAULT_SIDE;
  return parseIntArg(raw, 'HILBERT_N');
}

export function resolveSide(args: string[], env: NodeJS.ProcessEnv = process.env): number {
  const flag = getFlag(args, 'n');
  return flag === undefined ? defaultSide(env) : parseIntArg(flag, '--n');
}
