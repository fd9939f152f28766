import type { Crawler } from './crawler.js';
import type { CrawlStats, SetStatusResult } from './types.js';

const ARG_COMMANDS = {
  seed: '<url>',
  pause: '<url>',
  'pause-prefix': '<prefix>',
  resume: '<url>',
  'resume-prefix': '<prefix>',
  list: '<prefix>'
} as const;

type ArgCommand = keyof typeof ARG_COMMANDS;

const OPTIONAL_ARG_COMMANDS = {
  'resume-domain': '[domain]',
  paused: '[domain]'
} as const;

type OptionalArgCommand = keyof typeof OPTIONAL_ARG_COMMANDS;
type BareCommand = 'resume-all' | 'stats' | 'status' | 'help' | 'stop';

const BARE_COMMANDS: ReadonlySet<string> = new Set<BareCommand>(['resume-all', 'stats', 'status', 'help', 'stop']);

export type Command =
  | { name: ArgCommand; arg: string }
  | { name: OptionalArgCommand; arg?: string }
  | { name: BareCommand }
  | { name: 'invalid'; message: string };

function isArgCommand(name: string): name is ArgCommand {
  return Object.hasOwn(ARG_COMMANDS, name);
}

function isOptionalArgCommand(name: string): name is OptionalArgCommand {
  return Object.hasOwn(OPTIONAL_ARG_COMMANDS, name);
}

function isBareCommand(name: string): name is BareCommand {
  return BARE_COMMANDS.has(name);
}

export const HELP = [
  'Commands:',
  '  seed <url>             - add a new seed URL (page or sitemap)',
  '  pause <url>            - pause a single pending URL',
  '  pause-prefix <prefix>  - pause all pending URLs with given prefix',
  '  resume <url>           - resume a paused (or errored) URL',
  '  resume-prefix <prefix> - resume paused URLs with prefix',
  '  resume-all             - resume every paused URL',
  '  resume-domain [domain] - resume paused URLs on a domain (default: main domain)',
  '  paused [domain]        - list paused URLs, optionally for one domain',
  '  list <prefix>          - list pending URLs with prefix',
  '  stats                  - show crawler statistics and top paused domains',
  '  status                 - show worker & URL counts',
  '  stop / quit            - save state and exit',
  '  help                   - show this help'
];

export function parseCommand(line: string): Command | null {
  const trimmed = line.trim();
  if (!trimmed) return null;
  const space = trimmed.search(/\s/);
  const raw = (space < 0 ? trimmed : trimmed.slice(0, space)).toLowerCase();
  const arg = space < 0 ? '' : trimmed.slice(space + 1).trim();
  const name = raw === 'quit' || raw === 'exit' ? 'stop' : raw;

  if (isArgCommand(name)) {
    if (!arg) return { name: 'invalid', message: `Usage: ${name} ${ARG_COMMANDS[name]}` };
    return { name, arg };
  }
  if (isOptionalArgCommand(name)) return arg ? { name, arg } : { name };
  if (isBareCommand(name)) return { name };
  return { name: 'invalid', message: `Unknown command: '${raw}'. Type 'help' for list of commands.` };
}

function describeStatusChange(action: 'pause' | 'resume', url: string, res: SetStatusResult): string {
  if (res.ok) return `${action === 'pause' ? 'Paused' : 'Resumed'} URL: ${res.record.url}`;
  if (res.reason === 'not_found') return `URL not found: ${url}`;
  return `Cannot ${action} URL in status '${res.status}': ${url}`;
}

export function formatStats(s: CrawlStats): string[] {
  const t = s.totals;
  const lines = [
    '=== Crawler Stats ===',
    `Total URLs: ${t.total}`,
    `  Pending: ${t.pending}  In progress: ${t.in_progress}  Visited: ${t.visited}  Paused: ${t.paused}  Error: ${t.error}`,
    `Earliest seed: ${s.earliestSeed ?? '-'}`,
    '',
    'Top paused domains:'
  ];
  for (const d of s.topPausedDomains) lines.push(`  ${d.name}: ${d.count}`);
  lines.push('', 'Top paused prefixes (host[/first_segment]):');
  for (const p of s.topPausedPrefixes) lines.push(`  ${p.name}: ${p.count}`);
  lines.push('', 'Top domains overall:');
  for (const d of s.domainDistribution) lines.push(`  ${d.name}: ${d.count}`);
  return lines;
}

const LIST_LIMIT = 20;

/** Executes one operator command and returns the lines to print. */
export async function runCommand(crawler: Crawler, cmd: Command): Promise<string[]> {
  switch (cmd.name) {
    case 'invalid':
      return [cmd.message];
    case 'help':
      return HELP;
    case 'seed': {
      const res = await crawler.seed(cmd.arg);
      if (res.result === 'invalid') return [`Invalid URL: ${res.input}`];
      if (res.result === 'skipped') return [`URL already known (skipped): ${res.url}`];
      return [`Seeded URL: ${res.url}`];
    }
    case 'pause':
      return [describeStatusChange('pause', cmd.arg, await crawler.pause(cmd.arg))];
    case 'resume':
      return [describeStatusChange('resume', cmd.arg, await crawler.resume(cmd.arg))];
    case 'pause-prefix': {
      const res = await crawler.pausePrefix(cmd.arg);
      return [`Paused ${res.paused} URL(s) with prefix: ${cmd.arg} (removed ${res.removedFromQueue} from in-memory queue)`];
    }
    case 'resume-prefix':
      return [`Resumed ${await crawler.resumePrefix(cmd.arg)} URL(s) with prefix: ${cmd.arg}`];
    case 'resume-all':
      return [`Resumed ${await crawler.resumeAllPaused()} paused URL(s).`];
    case 'resume-domain': {
      const domain = cmd.arg ?? (await crawler.mainDomain());
      if (!domain) return ['No domain given and the frontier is empty.'];
      return [`Resumed ${await crawler.resumeDomain(domain)} paused URL(s) for domain: ${domain}`];
    }
    case 'paused': {
      const urls = await crawler.listPaused(cmd.arg);
      const scope = cmd.arg ? ` for domain '${cmd.arg}'` : '';
      const lines = [`Found ${urls.length} paused URL(s)${scope}:`];
      urls.slice(0, LIST_LIMIT).forEach((u, i) => lines.push(`  ${i + 1}) ${u}`));
      if (urls.length > LIST_LIMIT) lines.push('  ... (truncated)');
      return lines;
    }
    case 'list': {
      const urls = await crawler.listPending(cmd.arg);
      const lines = [`Found ${urls.length} pending URL(s) with prefix '${cmd.arg}':`];
      for (const u of urls.slice(0, LIST_LIMIT)) lines.push(`  ${u}`);
      if (urls.length > LIST_LIMIT) lines.push('  ... (truncated)');
      return lines;
    }
    case 'stats':
      return formatStats(await crawler.stats());
    case 'status': {
      const s = await crawler.status();
      const c = s.counts;
      return [
        `Workers: ${s.workers} | Queued: ${s.queued} | Pending: ${c.pending} | In progress: ${c.in_progress} | ` +
          `Visited: ${c.visited} | Paused: ${c.paused} | Error: ${c.error}`
      ];
    }
    case 'stop':
      await crawler.stop();
      return ['State saved. Exiting.'];
  }
}
