import pc from 'picocolors';
import {
  UNKNOWN_AGE_HOURS,
  formatStatusEntry,
  isDirty,
  type Report,
  type ReportEntry,
  type ScanWarning,
} from '@roster/repo';
import { formatTable } from './table';

type Colors = ReturnType<typeof pc.createColors>;

export interface ScanResultView {
  roots: string[];
  cachePath: string;
  repositories: string[];
  added: string[];
  pruned: string[];
  warnings: ScanWarning[];
  directoriesVisited: number;
  durationMs: number;
}

export interface ListView {
  cachePath: string;
  repositories: string[];
}

export interface InfoView {
  version: string;
  rosterHome: string;
  userConfigPath: string;
  configPath: string | undefined;
  cachePath: string;
  repositoryCount: number;
  cacheUpdatedAt: string | null;
  cacheAgeHours: number | null;
}

export interface RendererOptions {
  /** Defaults to what the terminal supports */
  color?: boolean;
}

export function formatAge(hours: number): string {
  return hours === UNKNOWN_AGE_HOURS ? '-' : `${hours}h`;
}

export class OutputRenderer {
  private readonly c: Colors;

  constructor(
    private isJson: boolean,
    options: RendererOptions = {},
  ) {
    this.c = pc.createColors(options.color ?? pc.isColorSupported);
  }

  renderScan(view: ScanResultView): void {
    if (this.isJson) {
      this.json(view);
      return;
    }
    const { c } = this;
    console.log(
      `Found ${c.bold(String(view.repositories.length))} repositories ` +
        `(${view.added.length} new, ${view.pruned.length} removed) ` +
        `in ${view.directoriesVisited} directories.`,
    );
    if (view.warnings.length > 0) {
      console.log(c.yellow(`\nSkipped ${view.warnings.length} paths:`));
      for (const warning of view.warnings) {
        console.log(`  ${warning.path}: ${warning.message}`);
      }
    }
    console.log(c.gray(`\nCache written to ${view.cachePath}`));
  }

  renderList(view: ListView): void {
    if (this.isJson) {
      this.json(view);
      return;
    }
    if (view.repositories.length === 0) {
      console.log(`No repositories cached. Run ${this.c.cyan('roster scan')} first.`);
      return;
    }
    for (const repo of view.repositories) {
      console.log(repo);
    }
  }

  renderStatus(report: Report): void {
    if (this.isJson) {
      this.json(report);
      return;
    }
    if (report.entries.length === 0) {
      console.log('No repositories to show.');
      return;
    }
    const ageWidth = Math.max(
      ...report.entries.map((entry) =>
        entry.accessible ? formatAge(entry.lastCommitAgeHours).length : 1,
      ),
    );
    for (const entry of report.entries) {
      console.log(this.statusLine(entry, ageWidth));
      if (entry.accessible && entry.statusEntries) {
        for (const file of entry.statusEntries) {
          console.log(`    ${formatStatusEntry(file)}`);
        }
      }
    }
    console.log(this.c.gray(`\n${this.countsLine(report)}`));
  }

  renderStashes(report: Report): void {
    if (this.isJson) {
      this.json({
        entries: report.entries.map((entry) =>
          entry.accessible
            ? { path: entry.path, stashes: entry.stashes ?? [] }
            : { path: entry.path, error: entry.error },
        ),
      });
      return;
    }
    let shown = 0;
    for (const entry of report.entries) {
      if (!entry.accessible) {
        console.log(`${this.c.red(entry.path)} (unavailable: ${entry.error.message})`);
        continue;
      }
      const stashes = entry.stashes ?? [];
      if (stashes.length === 0) continue;
      shown++;
      console.log(this.c.bold(entry.path));
      for (const stash of stashes) {
        console.log(`    ${stash}`);
      }
    }
    if (shown === 0) {
      console.log('No stashes found.');
    }
  }

  renderInfo(view: InfoView): void {
    if (this.isJson) {
      this.json(view);
      return;
    }
    console.log(
      formatTable([
        ['Version', view.version],
        ['Home', view.rosterHome],
        ['User config', view.userConfigPath],
        ['Config', view.configPath ?? '-'],
        ['Cache', view.cachePath],
        ['Repositories', String(view.repositoryCount)],
        ['Cache updated', view.cacheUpdatedAt ?? 'never'],
        ['Cache age', view.cacheAgeHours === null ? '-' : formatAge(view.cacheAgeHours)],
      ]),
    );
  }

  log(message: string): void {
    if (this.isJson) {
      // JSON mode should not have logs
    } else {
      console.log(this.c.gray(message));
    }
  }

  private statusLine(entry: ReportEntry, ageWidth: number): string {
    const { c } = this;
    if (!entry.accessible) {
      const reason = c.red(`(unavailable: ${entry.error.message})`);
      return `${c.red('--')} ${'-'.padStart(ageWidth)}  ${entry.path} ${reason}`;
    }
    const code = isDirty(entry) ? c.yellow(entry.shortStatus) : entry.shortStatus;
    return `${code} ${formatAge(entry.lastCommitAgeHours).padStart(ageWidth)}  ${entry.path}`;
  }

  private countsLine(report: Report): string {
    const { total, dirty, inaccessible } = report.counts;
    const parts = [`${total} repositories`, `${dirty} dirty`];
    if (inaccessible > 0) parts.push(`${inaccessible} unavailable`);
    if (report.entries.length !== total) parts.push(`${report.entries.length} shown`);
    return parts.join(', ');
  }

  private json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }
}
