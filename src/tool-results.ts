import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { SessionResult, TargetCoordinate } from './types.js';

export function text(body: string, isError = false): CallToolResult {
  return { content: [{ type: 'text', text: body }], ...(isError ? { isError: true } : {}) };
}

/** Reads `{ x, y }` from tool arguments; both must be finite numbers. */
export function parseTarget(args: Record<string, unknown> | undefined): TargetCoordinate {
  const x = args?.x;
  const y = args?.y;
  if (typeof x !== 'number' || typeof y !== 'number' || !Number.isFinite(x) || !Number.isFinite(y)) {
    throw new Error('scanToCoordinate requires numeric x and y');
  }
  return { x: Math.round(x), y: Math.round(y) };
}

export function formatSessionResult(result: SessionResult): string {
  const lines: string[] = [];
  switch (result.outcome) {
    case 'Converged':
      lines.push(`Converged at (${result.coordinate.x}, ${result.coordinate.y})`);
      break;
    case 'Exhausted':
      lines.push('Exhausted: attempt limit reached before converging');
      break;
    case 'Aborted':
      lines.push(`Aborted [${result.code}]: ${result.reason}`);
      break;
  }
  lines.push(`Moves: ${result.attempts}`);
  lines.push(`Elapsed: ${result.elapsedMs}ms`);
  if (result.lastCoordinate) {
    lines.push(`Last readout: (${result.lastCoordinate.x}, ${result.lastCoordinate.y})`);
  }
  if (result.bestCoordinate) {
    lines.push(`Closest readout: (${result.bestCoordinate.x}, ${result.bestCoordinate.y})`);
  }
  return lines.join('\n');
}
