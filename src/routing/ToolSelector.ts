import type { ToolDescriptor } from '../protocol/types.js';
import { VarietyError, VarietyErrorCode } from '../utils/errors.js';
import { tokenize } from '../utils/tokens.js';

function overlap(capabilityTokens: Set<string>, tool: ToolDescriptor): number {
  const toolTokens = new Set([...tokenize(tool.name), ...tokenize(tool.description ?? '')]);
  let count = 0;
  for (const token of capabilityTokens) {
    if (toolTokens.has(token)) count++;
  }
  return count;
}

/**
 * Picks the tool a capability maps to: an exact (case-insensitive) name
 * match, else the tool sharing most tokens with the capability, else the
 * first tool. Ties keep server order.
 *
 * @throws {VarietyError} `NO_TOOLS` when the server exposes none.
 */
export function selectTool(capability: string, tools: readonly ToolDescriptor[]): ToolDescriptor {
  const first = tools[0];
  if (!first) {
    throw new VarietyError(
      `Server exposes no tools for '${capability}'`,
      VarietyErrorCode.NO_TOOLS,
      { capability },
      'ToolSelector',
    );
  }

  const wanted = capability.trim().toLowerCase();
  const exact = tools.find((tool) => tool.name.toLowerCase() === wanted);
  if (exact) return exact;

  const capabilityTokens = new Set(tokenize(capability));
  let best = first;
  let bestOverlap = 0;
  for (const tool of tools) {
    const score = overlap(capabilityTokens, tool);
    if (score > bestOverlap) {
      best = tool;
      bestOverlap = score;
    }
  }
  return best;
}
