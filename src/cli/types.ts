export interface TargetOptions {
  ip?: string;
}

export interface TextOptions extends TargetOptions {
  size: number;
}

export interface ImageOptions extends TargetOptions {
  forceRaw: boolean;
}

export interface MapOptions extends TargetOptions {
  lat?: number;
  lon?: number;
  location?: string;
  zoom?: number;
  apiKey?: string;
  forceRaw: boolean;
}

export interface MqttOptions extends TargetOptions {
  topic: string;
  broker: string;
  port: number;
  username?: string;
  password?: string;
}

export interface StatusOptions extends TargetOptions {
  verbose: boolean;
}

export type GlobalOptions = {
  verbose: boolean;
};
