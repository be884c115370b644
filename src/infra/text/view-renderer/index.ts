import type { InternalEntry } from '../../../domain/entry.js';
import { compareEntries } from '../../../domain/entry.js';
import { formatEntryLine, supportedColumns } from '../../../domain/entry-parser.js';
import { ENGINE_FILETYPE } from '../../../config/app-config.js';
import type { ColumnSpec, ViewRendererPort } from '../../../ports/view-renderer.port.js';
import type { BufferId, HostPort } from '../../../ports/host.port.js';
import type { AdapterRegistry } from '../../../application/services/adapter-registry.js';

export type ViewRendererHost = Pick<HostPort, 'setFiletype' | 'setBuftype' | 'setLines'>;

/**
 * Plain-text listing: one line per entry, directories first.
 */
export class TextViewRenderer implements ViewRendererPort {
  private columns: readonly ColumnSpec[];

  constructor(
    private readonly host: ViewRendererHost,
    private readonly registry: AdapterRegistry,
    columns: readonly ColumnSpec[]
  ) {
    this.columns = columns;
  }

  initialize(buf: BufferId): void {
    this.host.setFiletype(buf, ENGINE_FILETYPE);
    this.host.setBuftype(buf, 'acwrite');
  }

  render(buf: BufferId, url: string, entries: readonly InternalEntry[]): void {
    const adapter = this.registry.getAdapter(url);
    const columns = adapter ? supportedColumns(adapter, this.columns) : [];
    const sorted = [...entries].sort(compareEntries);
    const lines = sorted.map((entry) => formatEntryLine(entry, columns));
    this.host.setLines(buf, lines.length > 0 ? lines : ['']);
  }

  setColumns(columns: readonly ColumnSpec[]): void {
    this.columns = columns;
  }

  getColumns(): readonly ColumnSpec[] {
    return this.columns;
  }
}
