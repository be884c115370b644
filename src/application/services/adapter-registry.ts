import { ok, err, type Result } from 'neverthrow';
import type { AdapterPort } from '../../ports/adapter.port.js';
import type { ConfigInvalidError, ConfigIssue } from '../../errors/app-error.js';
import { Err } from '../../errors/factories.js';
import { parseUrl } from '../../domain/url.js';

export interface ResolvedAddress {
  /** Canonical (alias-free) scheme */
  readonly scheme: string;
  readonly path: string;
  /** Canonical address: `scheme + path` */
  readonly url: string;
  readonly adapter: AdapterPort;
  /** The alias the caller used, when it was rewritten */
  readonly aliasedFrom?: string;
}

/**
 * Scheme → adapter lookup table, built once at setup.
 *
 * Alias chains are flattened at build time, so a lookup rewrites an alias to
 * its canonical scheme in exactly one step. A cycle among aliases, an alias
 * that ends at an unregistered scheme, or a scheme bound to an adapter nobody
 * provided, is a configuration error.
 */
export class AdapterRegistry {
  private constructor(
    private readonly schemes: ReadonlyMap<string, AdapterPort>,
    private readonly aliases: ReadonlyMap<string, string>,
    private readonly adapterSchemes: ReadonlyMap<string, string>
  ) {}

  static create(args: {
    readonly schemes: Readonly<Record<string, string>>;
    readonly aliases: Readonly<Record<string, string>>;
    readonly adapters: readonly AdapterPort[];
  }): Result<AdapterRegistry, ConfigInvalidError> {
    const issues: ConfigIssue[] = [];
    const byName = new Map<string, AdapterPort>();
    for (const adapter of args.adapters) byName.set(adapter.name, adapter);

    const schemes = new Map<string, AdapterPort>();
    const adapterSchemes = new Map<string, string>();
    for (const [scheme, adapterName] of Object.entries(args.schemes)) {
      const adapter = byName.get(adapterName);
      if (!adapter) {
        issues.push({ path: `adapters.${scheme}`, message: `no adapter named "${adapterName}" was provided` });
        continue;
      }
      schemes.set(scheme, adapter);
      if (!adapterSchemes.has(adapterName)) adapterSchemes.set(adapterName, scheme);
    }

    const aliases = new Map<string, string>();
    for (const alias of Object.keys(args.aliases)) {
      if (schemes.has(alias)) {
        issues.push({ path: `adapterAliases.${alias}`, message: 'scheme is both an alias and a registered scheme' });
        continue;
      }
      const target = flattenAlias(alias, args.aliases, schemes);
      if (target.isErr()) {
        issues.push({ path: `adapterAliases.${alias}`, message: target.error });
        continue;
      }
      aliases.set(alias, target.value);
    }

    if (issues.length > 0) return err(Err.configInvalid(issues));
    return ok(new AdapterRegistry(schemes, aliases, adapterSchemes));
  }

  /**
   * Adapter for a scheme, or for the scheme of a full address.
   * Aliases resolve to their canonical adapter. Undefined is a normal outcome.
   */
  getAdapter(schemeOrUrl: string): AdapterPort | undefined {
    const scheme = parseUrl(schemeOrUrl)?.scheme;
    if (scheme === undefined) return undefined;
    const canonical = this.aliases.get(scheme) ?? scheme;
    return this.schemes.get(canonical);
  }

  /**
   * Parse an address against the registered schemes, rewriting an alias once.
   */
  resolve(address: string): ResolvedAddress | undefined {
    const parsed = parseUrl(address);
    if (!parsed) return undefined;
    const target = this.aliases.get(parsed.scheme);
    const scheme = target ?? parsed.scheme;
    const adapter = this.schemes.get(scheme);
    if (!adapter) return undefined;
    const resolved = { scheme, path: parsed.path, url: scheme + parsed.path, adapter };
    return target === undefined ? resolved : { ...resolved, aliasedFrom: parsed.scheme };
  }

  /** First scheme bound to an adapter name */
  schemeFor(adapterName: string): string | undefined {
    return this.adapterSchemes.get(adapterName);
  }
}

function flattenAlias(
  alias: string,
  aliases: Readonly<Record<string, string>>,
  schemes: ReadonlyMap<string, AdapterPort>
): Result<string, string> {
  const seen = new Set<string>([alias]);
  let current = aliases[alias];
  while (current !== undefined) {
    if (schemes.has(current)) return ok(current);
    if (seen.has(current)) {
      return err(`alias cycle: ${[...seen, current].join(' -> ')}`);
    }
    seen.add(current);
    const next: string | undefined = aliases[current];
    if (next === undefined) return err(`alias target "${current}" is not a registered scheme`);
    current = next;
  }
  return err('alias has no target');
}
