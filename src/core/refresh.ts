import type { Layout, RefreshReport, Reporter } from '../types/records.js';
import type { Host } from './host.js';
import { collectRecords, type CollectOptions } from './collector.js';
import { resolveAliases } from './resolver.js';
import { link } from './linker.js';
import { getOverridesFile } from './layout.js';

export interface RefreshOptions extends CollectOptions {
  report?: Reporter;
  commandName?: string;
  overridesFile?: string;
}

export function refresh(layout: Layout, host: Host, options: RefreshOptions = {}): RefreshReport {
  host.requireTools();

  const result: RefreshReport = {
    records: collectRecords(layout, options),
    created: [],
    replaced: [],
    unchanged: [],
    skipped: [],
  };

  if (result.records.length === 0) {
    host.rehash();
    return result;
  }

  const plans = resolveAliases(result.records, layout, {
    overridesFile: options.overridesFile ?? getOverridesFile(layout),
    commandName: options.commandName,
    report: options.report,
  });

  for (const plan of plans) {
    if (plan.action === 'skip') {
      result.skipped.push(plan.alias);
      continue;
    }
    const outcome = link(layout, plan.alias, plan.installation.installationPath, 'safe');
    if (outcome === 'occupied') {
      options.report?.({
        level: 'warn',
        code: 'alias-occupied',
        alias: plan.alias,
        message: `alias '${plan.alias}' is occupied by an entry this tool does not own; left as is.`,
      });
      result.skipped.push(plan.alias);
    } else {
      result[outcome].push(plan.alias);
    }
  }

  // Aliases written above stay in place if this throws.
  host.rehash();
  return result;
}
