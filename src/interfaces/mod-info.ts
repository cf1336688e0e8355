/**
 * Mod inventory related interfaces and types
 */

/**
 * Which game roles a mod declares (or is inferred) to run on
 */
export type SideSupport = 'client-only' | 'server-only' | 'both' | 'unknown';

/**
 * The metadata format a ModInfo record was read from
 */
export type MetadataFormat =
  | 'forge-toml'
  | 'fabric-json'
  | 'legacy-mcmod'
  | 'manifest'
  | 'anonymous';

export type ModLoader = 'neoforge' | 'forge' | 'fabric' | 'unknown';

/**
 * Identity and metadata of one mod archive
 */
export interface ModInfo {
  modId: string;
  name: string;
  version: string;
  filename: string;
  contentHash: string;
  size: number;
  sideSupport: SideSupport;
  format: MetadataFormat;
  loader: ModLoader;
}

/**
 * The metadata part of a ModInfo, independent of where the archive is stored
 */
export type ModMetadata = Omit<ModInfo, 'filename' | 'contentHash' | 'size'>;

/**
 * Two or more archives in one structure claiming the same mod id
 * with different content
 */
export interface ModConflict {
  modId: string;
  filenames: string[];
  contentHashes: string[];
}

export type ScanErrorKind =
  | 'corrupt-archive'
  | 'metadata-parse-error'
  | 'not-found'
  | 'permission-denied'
  | 'io-error';

/**
 * An entry that could not be read or understood during a scan
 */
export interface ScanError {
  filename: string;
  kind: ScanErrorKind;
  message: string;
}

/**
 * A scanned inventory of one mod directory at one point in time
 */
export interface MinecraftStructure {
  root: string;
  scannedAt: string; // ISO date string
  mods: ReadonlyMap<string, ModInfo>;
  conflicts: readonly ModConflict[];
  errors: readonly ScanError[];
}
