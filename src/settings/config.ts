export type Id3Version = 3 | 4;

export interface Config {
  "cover-description": string;
  "id3-version": Id3Version;
  "vorbis-vendor": string;
  "debug-logging": boolean;
}

export type ConfigKey = keyof Config;

export const configKeys: ConfigKey[] = ["cover-description", "id3-version", "vorbis-vendor", "debug-logging"];

const envNames: Record<ConfigKey, string> = {
  "cover-description": "TAGFILL_COVER_DESCRIPTION",
  "id3-version": "TAGFILL_ID3_VERSION",
  "vorbis-vendor": "TAGFILL_VORBIS_VENDOR",
  "debug-logging": "TAGFILL_DEBUG",
};

export const defaultConfig: Readonly<Config> = {
  "cover-description": "Front cover",
  "id3-version": 4,
  "vorbis-vendor": "tagfill",
  "debug-logging": false,
};

let config: Config | null = null;

function parseId3Version(raw: string): Id3Version | undefined {
  if (raw === "3") return 3;
  if (raw === "4") return 4;
  return undefined;
}

/**
 * Builds the configuration from environment variables, falling back to
 * {@link defaultConfig} for anything unset or unparsable.
 */
export function loadConfiguration(env: NodeJS.ProcessEnv = process.env): Config {
  const loaded: Config = { ...defaultConfig };

  const coverDescription = env[envNames["cover-description"]];
  if (coverDescription !== undefined) loaded["cover-description"] = coverDescription;

  const id3Version = env[envNames["id3-version"]];
  if (id3Version !== undefined) {
    loaded["id3-version"] = parseId3Version(id3Version.trim()) ?? defaultConfig["id3-version"];
  }

  const vendor = env[envNames["vorbis-vendor"]];
  if (vendor !== undefined && vendor.length > 0) loaded["vorbis-vendor"] = vendor;

  loaded["debug-logging"] = env[envNames["debug-logging"]] === "true";

  config = loaded;
  return loaded;
}

export function getConfigValue<K extends ConfigKey>(key: K): Config[K] {
  if (config === null) config = loadConfiguration();

  return config[key];
}

export function resetConfig(): void {
  config = null;
}
