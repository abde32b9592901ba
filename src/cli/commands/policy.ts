/**
 * Policy and routing commands: /policy, /mode.
 */

import { parseAutoExecMode, parseBool, parseExecutionMode } from '../../config.js';
import type { PolicyStore } from '../../policy-store.js';
import { describePolicy } from '../../safety.js';
import type { SlashCommand } from '../command-registry.js';

const POLICY_USAGE =
  'usage: /policy show|mode <safe|all|custom>|allow <p>|unallow <p>|deny <p>|undeny <p>|trust <p>|untrust <p>|confirm on|off';

type ListOp = (store: PolicyStore, prefix: string) => Promise<boolean>;

const LIST_OPS: Record<string, { op: ListOp; verb: string }> = {
  allow: { op: (s, p) => s.addAllow(p), verb: 'allowed' },
  unallow: { op: (s, p) => s.removeAllow(p), verb: 'removed from allow list' },
  deny: { op: (s, p) => s.addDeny(p), verb: 'denied' },
  undeny: { op: (s, p) => s.removeDeny(p), verb: 'removed from deny list' },
  trust: { op: (s, p) => s.trustPrefix(p), verb: 'trusted' },
  untrust: { op: (s, p) => s.untrustPrefix(p), verb: 'no longer trusted' },
};

export const policyCommands: SlashCommand[] = [
  {
    name: '/policy',
    usage: '/policy show|mode|allow|deny|trust|confirm ...',
    description: 'Show or change the auto-exec policy (saved to config)',
    async execute(ctx, args) {
      const sub = (args[0] ?? 'show').toLowerCase();
      const rest = args.slice(1).join(' ');
      const store = ctx.rt.policy;

      if (sub === 'show') {
        ctx.print(describePolicy(store.snapshot()));
        return;
      }

      if (sub === 'mode') {
        const mode = parseAutoExecMode(rest);
        if (!mode) {
          ctx.print('usage: /policy mode safe|all|custom');
          return;
        }
        await store.setMode(mode);
        ctx.print(`auto_exec_mode=${mode}`);
        return;
      }

      if (sub === 'confirm') {
        const on = parseBool(rest);
        if (on === undefined) {
          ctx.print('usage: /policy confirm on|off');
          return;
        }
        await store.setConfirm(on);
        ctx.print(`auto_confirm_exec=${on ? 'on' : 'off'}`);
        return;
      }

      const listOp = Object.hasOwn(LIST_OPS, sub) ? LIST_OPS[sub] : undefined;
      if (listOp && rest) {
        const changed = await listOp.op(store, rest);
        ctx.print(changed ? `"${rest}" ${listOp.verb}` : `no change for "${rest}"`);
        return;
      }

      ctx.print(POLICY_USAGE);
    },
  },
  {
    name: '/mode',
    usage: '/mode show|chat|agent-auto|agent-force',
    description: 'Choose how requests are routed (this process only)',
    async execute(ctx, args) {
      const arg = args[0];
      if (!arg || arg.toLowerCase() === 'show') {
        ctx.print(`execution mode: ${ctx.mode}`);
        return;
      }
      const mode = parseExecutionMode(arg);
      if (!mode) {
        ctx.print('usage: /mode show|chat|agent-auto|agent-force');
        return;
      }
      ctx.mode = mode;
      ctx.print(`execution mode: ${mode}`);
    },
  },
];
