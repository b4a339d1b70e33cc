export interface ServerConfig {
  port?: number;
  host?: string;
  route?: string;
  contentType?: string;
}

export interface WatchConfig {
  pollIntervalMs?: number;
  rewatchDelayMs?: number;
}

export interface MountwatchConfig {
  file?: string;
  server?: ServerConfig;
  watch?: WatchConfig;
}

export interface ResolvedConfig {
  file: string;
  server: Required<ServerConfig>;
  watch: Required<WatchConfig>;
}

export interface ConfigSource {
  file: MountwatchConfig | null;
  filePath: string | null;
  env: MountwatchConfig;
  cli: MountwatchConfig;
}
