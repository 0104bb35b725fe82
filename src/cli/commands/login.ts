// login-spn, login default, logout and status

import chalk from 'chalk';
import type { CommandContext } from '../context.js';
import { log } from '../../utils/logger.js';
import { print } from '../../utils/output.js';

export interface LoginSpnOptions {
  clientId: string;
  clientSecret: string;
  tenantId: string;
}

function formatExpiry(expiresAt: number | null): string {
  return expiresAt === null ? 'unknown expiry' : `valid until ${new Date(expiresAt).toISOString()}`;
}

function warnIfOverridden(ctx: CommandContext): void {
  if (ctx.session.isManualOverrideActive()) {
    log.warn(`${ctx.config.auth.manualTokenEnvVar} is set and takes precedence over this login until it is unset`);
  }
}

export async function loginSpnCommand(ctx: CommandContext, options: LoginSpnOptions): Promise<void> {
  const credential = await ctx.session.login({
    kind: 'servicePrincipal',
    config: {
      clientId: options.clientId,
      clientSecret: options.clientSecret,
      tenantId: options.tenantId,
    },
  });
  print(chalk.green(`Successfully logged in with service principal ${options.clientId} (${formatExpiry(credential.expiresAt)})`));
  warnIfOverridden(ctx);
}

export async function loginDefaultCommand(ctx: CommandContext): Promise<void> {
  const credential = await ctx.session.login({ kind: 'interactive' });
  print(chalk.green(`Successfully logged in with the local session (${formatExpiry(credential.expiresAt)})`));
  warnIfOverridden(ctx);
}

export async function logoutCommand(ctx: CommandContext): Promise<void> {
  await ctx.session.logout();
  print('Logged out');
}

export async function statusCommand(ctx: CommandContext): Promise<void> {
  const summary = await ctx.session.describe();

  if (summary.manualOverride) {
    print(`Using token from ${ctx.config.auth.manualTokenEnvVar}`);
  }

  if (summary.state.status === 'unauthenticated') {
    print('Not logged in');
    return;
  }

  const label = summary.state.sourceKind === 'servicePrincipal' ? 'service principal' : 'local session';
  print(`Logged in with ${label}`);
  for (const [audience, info] of Object.entries(summary.credentials)) {
    if (!info) continue;
    const state = info.expired ? 'expired' : formatExpiry(info.expiresAt);
    print(`  ${audience}: ${state}`);
  }
}
