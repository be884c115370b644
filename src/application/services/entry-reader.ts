import type { Entry } from '../../domain/entry.js';
import { resolveLine, supportedColumns } from '../../domain/entry-parser.js';
import type { BufferId, HostPort } from '../../ports/host.port.js';
import type { EntryCachePort } from '../../ports/entry-cache.port.js';
import type { ViewRendererPort } from '../../ports/view-renderer.port.js';
import type { AdapterRegistry } from './adapter-registry.js';
import { ENGINE_FILETYPE } from '../../config/app-config.js';

/**
 * Reads entries back out of directory buffer text.
 */
export class EntryReader {
  constructor(
    private readonly host: HostPort,
    private readonly registry: AdapterRegistry,
    private readonly view: ViewRendererPort,
    private readonly cache: EntryCachePort
  ) {}

  /** Entry on a 1-indexed line of a directory buffer */
  entryOnLine(buf: BufferId, lnum: number): Entry | undefined {
    if (!this.host.isBufferValid(buf) || this.host.getFiletype(buf) !== ENGINE_FILETYPE) return undefined;
    const adapter = this.registry.getAdapter(this.host.getBufferName(buf));
    if (!adapter) return undefined;
    if (lnum < 1 || lnum > this.host.lineCount(buf)) return undefined;

    const [line] = this.host.getLines(buf, lnum - 1, lnum);
    if (line === undefined) return undefined;
    return resolveLine(line, supportedColumns(adapter, this.view.getColumns()), this.cache);
  }

  /** Entries of an inclusive line range, in line order, blank lines skipped */
  entriesInRange(buf: BufferId, start: number, end: number): readonly Entry[] {
    const [from, to] = start <= end ? [start, end] : [end, start];
    const entries: Entry[] = [];
    for (let lnum = from; lnum <= to; lnum++) {
      const entry = this.entryOnLine(buf, lnum);
      if (entry) entries.push(entry);
    }
    return entries;
  }

  /** First line whose entry is named `name` */
  findLine(buf: BufferId, name: string): number | undefined {
    const count = this.host.lineCount(buf);
    for (let lnum = 1; lnum <= count; lnum++) {
      if (this.entryOnLine(buf, lnum)?.name === name) return lnum;
    }
    return undefined;
  }
}
