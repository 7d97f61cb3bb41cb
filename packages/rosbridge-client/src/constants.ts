/**
 * Shared constants for the rosbridge client.
 */

// --- Connection ---
export const DEFAULT_BRIDGE_URL = 'ws://localhost:9090';
export const DEFAULT_BRIDGE_PORT = 9090;
export const DEFAULT_CONNECT_TIMEOUT_MS = 10000;
export const DEFAULT_RECONNECT_INTERVAL_MS = 1000;
export const DEFAULT_MAX_RECONNECT_INTERVAL_MS = 30000;

// --- Heartbeat ---
export const HEARTBEAT_INTERVAL_MS = 15000;
export const HEARTBEAT_STALE_MS = 30000;

// --- Requests ---
export const DEFAULT_SERVICE_TIMEOUT_MS = 10000;

// --- Channels ---
export const TOPIC_RECONNECT_DELAY_MS = 500;
export const DEFAULT_TOPIC_QUEUE_SIZE = 100;
export const SUPPORTED_COMPRESSION_TYPES = ['none', 'png'] as const;

// --- Actionlib ---
export const ACTION_STATUS_INTERVAL_MS = 500;

// --- TF ---
export const DEFAULT_TF_SERVICE_NAME = '/republish_tfs';
export const DEFAULT_TF_UPDATE_DELAY_MS = 50;
export const DEFAULT_TF_TOPIC_TIMEOUT_MS = 2000;

// --- WebSocket close codes ---
export const WS_CLOSE_NORMAL = 1000;

// --- Package ---
export const PACKAGE_NAME = 'rosbridge-client';
export const VERSION = '0.1.0';
