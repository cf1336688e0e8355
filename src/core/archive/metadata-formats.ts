import { z } from 'zod';
import { parse as parseToml } from 'smol-toml';
import type {
  MetadataFormat,
  ModLoader,
  ModMetadata,
  SideSupport,
} from '../../interfaces/mod-info';
import { metadataParseError } from '../../utils/errors';
import type { ArchiveContents } from './archive-reader';

export const NEOFORGE_TOML = 'META-INF/neoforge.mods.toml';
export const FORGE_TOML = 'META-INF/mods.toml';
export const FABRIC_JSON = 'fabric.mod.json';
export const MCMOD_INFO = 'mcmod.info';
export const META_INF_MCMOD_INFO = 'META-INF/mcmod.info';
export const MANIFEST = 'META-INF/MANIFEST.MF';

const JAR_VERSION_PLACEHOLDER = '${file.jarVersion}';
const LOADER_DEPENDENCIES = new Set(['minecraft', 'forge', 'neoforge']);

/**
 * One recognized metadata format. `parse` returns null when the entry exists
 * but is not mod metadata, which lets the next format be tried.
 */
export interface MetadataFormatReader {
  format: MetadataFormat;
  entries: readonly string[];
  parse(
    entry: string,
    contents: ArchiveContents,
    filename: string,
  ): ModMetadata | null;
}

const forgeModSchema = z.object({
  modId: z.string().min(1),
  version: z.string().min(1),
  displayName: z.string().optional(),
  side: z.string().optional(),
});

const forgeDependencySchema = z.object({
  modId: z.string(),
  side: z.string().optional(),
});

const forgeTomlSchema = z.object({
  mods: z.array(forgeModSchema).min(1),
  dependencies: z.record(z.array(forgeDependencySchema)).optional(),
});

const fabricSchema = z.object({
  id: z.string().min(1),
  version: z.string().min(1),
  name: z.string().optional(),
  environment: z.string().optional(),
});

const mcmodEntrySchema = z.object({
  modid: z.string().min(1),
  version: z.string().min(1),
  name: z.string().optional(),
});

const mcmodSchema = z.union([
  z.array(mcmodEntrySchema).min(1),
  z.object({ modList: z.array(mcmodEntrySchema).min(1) }),
  mcmodEntrySchema,
]);

function decodeText(data: Buffer): string {
  const text = data.toString('utf8');
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message,
    )
    .join('; ');
}

function parseJsonEntry(data: Buffer, entry: string, filename: string): unknown {
  try {
    return JSON.parse(decodeText(data));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw metadataParseError(filename, entry, reason);
  }
}

function entryData(contents: ArchiveContents, entry: string): Buffer {
  return contents.entries.get(entry) ?? Buffer.alloc(0);
}

/**
 * Parse a jar manifest: `Key: Value` lines, where a line starting with a
 * single space continues the previous value.
 */
export function parseManifest(text: string): Map<string, string> {
  const attributes = new Map<string, string>();
  let lastKey: string | null = null;

  for (const line of text.split(/\r?\n/)) {
    if (line.startsWith(' ') && lastKey !== null) {
      attributes.set(lastKey, (attributes.get(lastKey) ?? '') + line.slice(1));
      continue;
    }

    const separator = line.indexOf(':');
    if (separator <= 0) {
      lastKey = null;
      continue;
    }

    const key = line.slice(0, separator).trim();
    const value = line.slice(separator + 1).trim();
    // The main section comes first; later per-entry sections never override it
    if (!attributes.has(key)) {
      attributes.set(key, value);
      lastKey = key;
    } else {
      lastKey = null;
    }
  }

  return attributes;
}

function manifestAttributes(contents: ArchiveContents): Map<string, string> {
  const data = contents.entries.get(MANIFEST);
  return data ? parseManifest(decodeText(data)) : new Map();
}

export function mapForgeSide(side: string | undefined): SideSupport {
  switch (side?.trim().toUpperCase()) {
    case 'CLIENT':
      return 'client-only';
    case 'SERVER':
      return 'server-only';
    case 'BOTH':
      return 'both';
    default:
      return 'unknown';
  }
}

export function mapFabricEnvironment(
  environment: string | undefined,
): SideSupport {
  switch (environment?.trim()) {
    case 'client':
      return 'client-only';
    case 'server':
      return 'server-only';
    case '*':
      return 'both';
    default:
      return 'unknown';
  }
}

const forgeTomlReader: MetadataFormatReader = {
  format: 'forge-toml',
  entries: [NEOFORGE_TOML, FORGE_TOML],
  parse(entry, contents, filename) {
    let document: unknown;
    try {
      document = parseToml(decodeText(entryData(contents, entry)));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw metadataParseError(filename, entry, reason);
    }

    const parsed = forgeTomlSchema.safeParse(document);
    if (!parsed.success) {
      throw metadataParseError(filename, entry, describeIssues(parsed.error));
    }

    const [mod] = parsed.data.mods;
    const dependencies = parsed.data.dependencies?.[mod.modId] ?? [];

    let version = mod.version.trim();
    if (version === JAR_VERSION_PLACEHOLDER) {
      version = manifestAttributes(contents).get('Implementation-Version') || 'unknown';
    }

    let sideSupport = mapForgeSide(mod.side);
    if (sideSupport === 'unknown') {
      const loaderDependency = dependencies.find(
        (dependency) =>
          LOADER_DEPENDENCIES.has(dependency.modId) &&
          dependency.side !== undefined,
      );
      sideSupport = mapForgeSide(loaderDependency?.side);
    }

    const loader: ModLoader =
      entry === NEOFORGE_TOML ||
      dependencies.some((dependency) => dependency.modId === 'neoforge')
        ? 'neoforge'
        : 'forge';

    return {
      modId: mod.modId,
      name: mod.displayName || mod.modId,
      version,
      sideSupport,
      format: 'forge-toml',
      loader,
    };
  },
};

const fabricJsonReader: MetadataFormatReader = {
  format: 'fabric-json',
  entries: [FABRIC_JSON],
  parse(entry, contents, filename) {
    const document = parseJsonEntry(entryData(contents, entry), entry, filename);
    const parsed = fabricSchema.safeParse(document);
    if (!parsed.success) {
      throw metadataParseError(filename, entry, describeIssues(parsed.error));
    }

    return {
      modId: parsed.data.id,
      name: parsed.data.name || parsed.data.id,
      version: parsed.data.version,
      sideSupport: mapFabricEnvironment(parsed.data.environment),
      format: 'fabric-json',
      loader: 'fabric',
    };
  },
};

const legacyMcmodReader: MetadataFormatReader = {
  format: 'legacy-mcmod',
  entries: [MCMOD_INFO, META_INF_MCMOD_INFO],
  parse(entry, contents, filename) {
    const document = parseJsonEntry(entryData(contents, entry), entry, filename);
    const parsed = mcmodSchema.safeParse(document);
    if (!parsed.success) {
      throw metadataParseError(filename, entry, describeIssues(parsed.error));
    }

    const data = parsed.data;
    const mod = Array.isArray(data)
      ? data[0]
      : 'modList' in data
        ? data.modList[0]
        : data;

    return {
      modId: mod.modid,
      name: mod.name || mod.modid,
      version: mod.version,
      sideSupport: 'unknown',
      format: 'legacy-mcmod',
      loader: 'forge',
    };
  },
};

const manifestReader: MetadataFormatReader = {
  format: 'manifest',
  entries: [MANIFEST],
  parse(_entry, contents) {
    const attributes = manifestAttributes(contents);
    const title =
      attributes.get('Implementation-Title') ||
      attributes.get('Specification-Title') ||
      attributes.get('Bundle-Name');
    if (!title) {
      return null;
    }

    const version =
      attributes.get('Implementation-Version') ||
      attributes.get('Specification-Version') ||
      attributes.get('Bundle-Version') ||
      'unknown';

    return {
      modId: title.toLowerCase().replace(/[\s-]/g, '_'),
      name: title,
      version,
      sideSupport: 'unknown',
      format: 'manifest',
      loader: 'unknown',
    };
  },
};

/** Recognized formats in resolution order. */
export const METADATA_FORMATS: readonly MetadataFormatReader[] = [
  forgeTomlReader,
  fabricJsonReader,
  legacyMcmodReader,
  manifestReader,
];

export const METADATA_ENTRIES: ReadonlySet<string> = new Set(
  METADATA_FORMATS.flatMap((reader) => reader.entries),
);

/**
 * Normalize an archive file name into a mod id for archives without
 * metadata: basename without `.jar`, lower-cased, unsafe runs as `_`.
 */
export function anonymousModId(filename: string): string {
  const basename = filename.split('/').pop() ?? filename;
  const stem = basename.replace(/\.jar$/i, '');
  return stem.toLowerCase().replace(/[^a-z0-9._-]+/g, '_');
}

export function anonymousMetadata(filename: string): ModMetadata {
  const modId = anonymousModId(filename);
  return {
    modId,
    name: modId,
    version: 'unknown',
    sideSupport: 'unknown',
    format: 'anonymous',
    loader: 'unknown',
  };
}

/**
 * Resolve metadata in fixed priority. The first format with an entry
 * present wins; a malformed entry throws and never falls through.
 */
export function resolveMetadata(
  contents: ArchiveContents,
  filename: string,
): ModMetadata {
  for (const reader of METADATA_FORMATS) {
    const entry = reader.entries.find((name) => contents.entryNames.has(name));
    if (entry === undefined) {
      continue;
    }

    const metadata = reader.parse(entry, contents, filename);
    if (metadata) {
      return metadata;
    }
  }

  return anonymousMetadata(filename);
}
