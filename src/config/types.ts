// Logger types
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogMetadata = Record<string, unknown>;

export interface ServerConfig {
  readonly name: string;
  readonly version: string;
  readonly host: string;
  readonly port: number;
  readonly healthPath: string;
}

export interface OriginConfig {
  readonly url: URL;
  readonly timeoutMs: number;
}

export interface GateConfig {
  readonly routingParam: string;
  readonly loginFunctionId: string;
  readonly tokenParam: string;
  readonly accessCookieName: string;
  readonly clientIpHeader: string;
  readonly forwardedForHeader: string;
}

export interface SigningConfig {
  readonly secret?: string | undefined;
  readonly validityWindowSeconds: number;
  readonly clockSkewSeconds: number;
}

export interface LoggingConfig {
  readonly level: LogLevel;
  readonly enabled: boolean;
}

export interface AppConfig {
  readonly server: ServerConfig;
  readonly origin: OriginConfig;
  readonly gate: GateConfig;
  readonly signing: SigningConfig;
  readonly logging: LoggingConfig;
}

// Error response envelope
export interface ErrorResponse {
  error: {
    message: string;
    code: string;
    statusCode: number;
    stack?: string;
  };
}
