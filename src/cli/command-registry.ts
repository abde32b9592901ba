import { firstToken } from './command-utils.js';
import type { ReplContext } from './repl-context.js';

export interface SlashCommand {
  name: string;
  aliases?: string[];
  usage?: string;
  description?: string;
  execute(ctx: ReplContext, args: string[]): Promise<void>;
}

const registry = new Map<string, SlashCommand>();

export function registerCommand(cmd: SlashCommand): void {
  registry.set(cmd.name.toLowerCase(), cmd);
  for (const a of cmd.aliases ?? []) registry.set(a.toLowerCase(), cmd);
}

export function registerAll(cmds: SlashCommand[]): void {
  for (const c of cmds) registerCommand(c);
}

export function findCommand(line: string): SlashCommand | null {
  const head = firstToken(line);
  if (!head.startsWith('/')) return null;
  return registry.get(head) ?? null;
}

export function allCommands(): SlashCommand[] {
  return [...new Set(registry.values())].sort((a, b) => a.name.localeCompare(b.name));
}
