import type { Command } from 'commander';
import { readdirSync } from 'node:fs';
import { ALIAS_PATTERN } from '../config/schema.js';
import { aliasPath, isOwnedLink, listRegistrations } from '../core/index.js';
import { dirExists } from '../utils/fs.js';
import { resolveSymlinkTarget, isSymlink } from '../utils/platform.js';
import { printTable } from '../ui/table.js';
import { dieWith } from '../ui/output.js';
import { loadContext } from './context.js';

interface ListedLink {
  name: string;
  kind: 'registration' | 'alias';
  target: string;
  owner: 'managed' | 'foreign';
}

export function registerList(program: Command): void {
  program
    .command('list')
    .description('List registered toolchains and X.Y.Z aliases')
    .option('--json', 'Output as JSON')
    .action((opts: { json?: boolean }) => {
      try {
        const { layout } = loadContext();

        const aliases = dirExists(layout.versionsDir)
          ? readdirSync(layout.versionsDir).filter((name) => ALIAS_PATTERN.test(name)).sort()
          : [];

        const links: ListedLink[] = [];
        for (const [kind, names] of [
          ['registration', listRegistrations(layout)],
          ['alias', aliases],
        ] as const) {
          for (const name of names) {
            const path = aliasPath(layout, name);
            links.push({
              name,
              kind,
              target: isSymlink(path) ? resolveSymlinkTarget(path) : path,
              owner: isOwnedLink(layout, path) ? 'managed' : 'foreign',
            });
          }
        }

        if (opts.json) {
          console.log(JSON.stringify(links, null, 2));
          return;
        }

        printTable(
          ['Name', 'Kind', 'Owner', 'Target'],
          links.map((l) => [l.name, l.kind, l.owner, l.target]),
          'No registered toolchains or aliases found.',
        );
      } catch (err) {
        dieWith(err);
      }
    });
}
