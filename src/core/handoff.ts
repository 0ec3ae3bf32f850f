import { z } from 'zod';
import type { ToolSchema } from './types.js';

export const TRANSFER_TO_AGENT = 'transfer_to_agent';
export const TRANSFER_TO_PARENT = 'transfer_to_parent';

export function isHandoffToolName(name: string): boolean {
  return name === TRANSFER_TO_AGENT || name === TRANSFER_TO_PARENT;
}

/** The part of an agent the handoff tree needs. */
export interface HandoffNode<T extends HandoffNode<T>> {
  readonly name: string;
  readonly parentName: string | undefined;
  readonly handoffs: readonly T[];
}

export interface TransferResolution<T> {
  target?: T;
  output: string;
}

export function transferToAgentSchema(childNames: readonly string[]): ToolSchema {
  return {
    name: TRANSFER_TO_AGENT,
    description: 'Transfer the conversation to another agent that is better suited for the task.',
    parameters: {
      type: 'object',
      properties: {
        name: {
          type: 'string',
          description: 'Name of the agent to transfer to',
          enum: [...childNames]
        }
      },
      required: ['name']
    }
  };
}

export function transferToParentSchema(): ToolSchema {
  return {
    name: TRANSFER_TO_PARENT,
    description: 'Transfer the conversation back to the parent agent when the current task is finished or out of scope.',
    parameters: {
      type: 'object',
      properties: {}
    }
  };
}

const TransferArgsSchema = z.object({ name: z.string().min(1) });

export function walk<T extends HandoffNode<T>>(root: T): T[] {
  const seen: T[] = [];
  const stack: T[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node || seen.includes(node)) continue;
    seen.push(node);
    for (let i = node.handoffs.length - 1; i >= 0; i--) {
      const child = node.handoffs[i];
      if (child) stack.push(child);
    }
  }
  return seen;
}

export function findAgent<T extends HandoffNode<T>>(root: T, name: string): T | undefined {
  return walk(root).find(node => node.name === name);
}

export function findParent<T extends HandoffNode<T>>(root: T, agent: T): T | undefined {
  if (agent.parentName === undefined) return undefined;
  return walk(root).find(node => node.handoffs.includes(agent));
}

/** Names that occur more than once in the tree. */
export function duplicateNames<T extends HandoffNode<T>>(root: T): string[] {
  const counts = new Map<string, number>();
  for (const node of walk(root)) {
    counts.set(node.name, (counts.get(node.name) ?? 0) + 1);
  }
  return [...counts].filter(([, count]) => count > 1).map(([name]) => name);
}

export function resolveTransferToAgent<T extends HandoffNode<T>>(
  current: T,
  rawArgs: string
): TransferResolution<T> {
  if (current.handoffs.length === 0) {
    return { output: `Agent '${current.name}' has no handoffs configured.` };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(rawArgs);
  } catch {
    return { output: `Invalid arguments for ${TRANSFER_TO_AGENT}: expected a JSON object with a "name" field.` };
  }

  const args = TransferArgsSchema.safeParse(parsed);
  if (!args.success) {
    return { output: `Invalid arguments for ${TRANSFER_TO_AGENT}: expected a JSON object with a "name" field.` };
  }

  const target = current.handoffs.find(child => child.name === args.data.name);
  if (!target) {
    const available = current.handoffs.map(child => child.name).join(', ');
    return { output: `Agent '${args.data.name}' not found. Available agents: ${available}` };
  }

  return { target, output: `Transferring to agent: ${target.name}` };
}

export function resolveTransferToParent<T extends HandoffNode<T>>(root: T, current: T): TransferResolution<T> {
  const parent = findParent(root, current);
  if (!parent) {
    return { output: `Agent '${current.name}' has no parent agent to transfer to.` };
  }
  return { target: parent, output: `Transferring back to parent agent: ${parent.name}` };
}

export function resolveTransfer<T extends HandoffNode<T>>(
  root: T,
  current: T,
  name: string,
  rawArgs: string
): TransferResolution<T> {
  return name === TRANSFER_TO_PARENT
    ? resolveTransferToParent(root, current)
    : resolveTransferToAgent(current, rawArgs);
}
