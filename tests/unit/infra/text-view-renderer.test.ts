import { describe, it, expect } from 'vitest';
import { AdapterRegistry } from '../../../src/application/services/adapter-registry.js';
import { TextViewRenderer } from '../../../src/infra/text/view-renderer/index.js';
import { FakeAdapter, InMemoryHost } from '../../fakes/engine/index.js';

function setup() {
  const host = new InMemoryHost();
  const adapter = new FakeAdapter('files', host).addColumn('size', {
    render: (entry) => String(entry.meta?.size ?? '-'),
    parse: () => undefined,
  });
  const registry = AdapterRegistry.create({
    schemes: { 'burrow://': 'files' },
    aliases: {},
    adapters: [adapter],
  })._unsafeUnwrap();
  const view = new TextViewRenderer(host, registry, []);
  const buf = host.addBuffer('burrow:///srv/');
  return { host, view, buf };
}

describe('TextViewRenderer', () => {
  it('marks a buffer as a directory view', () => {
    const { host, view, buf } = setup();
    view.initialize(buf);
    expect(host.getFiletype(buf)).toBe('burrow');
    expect(host.getBuftype(buf)).toBe('acwrite');
  });

  it('writes one line per entry, directories first', () => {
    const { host, view, buf } = setup();
    view.render(buf, 'burrow:///srv/', [
      { id: '1', name: 'zeta.txt', type: 'file' },
      { id: '2', name: 'lib', type: 'directory' },
      { id: '13', name: 'alpha', type: 'link', meta: { linkTarget: 'lib' } },
    ]);
    expect(host.getLines(buf, 0, 3)).toEqual(['/002 lib/', '/013 alpha -> lib', '/001 zeta.txt']);
  });

  it('renders the columns the adapter supports', () => {
    const { host, view, buf } = setup();
    view.setColumns(['icon', 'size']);
    view.render(buf, 'burrow:///srv/', [{ id: '1', name: 'a.txt', type: 'file', meta: { size: 42 } }]);
    expect(host.getLines(buf, 0, 1)).toEqual(['/001 42 a.txt']);
    expect(view.getColumns()).toEqual(['icon', 'size']);
  });

  it('leaves a single empty line for an empty directory', () => {
    const { host, view, buf } = setup();
    view.render(buf, 'burrow:///srv/', []);
    expect(host.lineCount(buf)).toBe(1);
    expect(host.getLines(buf, 0, 1)).toEqual(['']);
  });
});
