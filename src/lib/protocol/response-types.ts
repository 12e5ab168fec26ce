/**
 * Response of `POST /api/mqtt`
 *
 * The device echoes the broker and topic it subscribed with. `connected`
 * is false when the broker could not be reached within the request.
 */
export interface MqttResponse {
  status?: string;
  connected: boolean;
  broker?: string;
  topic?: string;
}

/**
 * Response of `POST /api/retain`
 */
export interface RetainResponse {
  retain: boolean;
}

/**
 * Body sent to `POST /api/text`
 */
export interface TextPayload {
  text: string;
  size: number;
  clear: boolean;
}

/**
 * Body sent to `POST /api/mqtt`
 *
 * Credentials are omitted entirely when not set, never sent empty.
 */
export interface MqttPayload {
  broker: string;
  topic: string;
  port: number;
  username?: string;
  password?: string;
}
