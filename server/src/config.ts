import os from "node:os";

export const LOG_LEVEL = process.env.LOG_LEVEL || "info";

export const RELEASE =
  process.env.RELEASE || process.env.RENDER_GIT_COMMIT || undefined;

/** Longest raw address string the API will accept, in characters. */
export const MAX_ADDRESS_LENGTH = 1000;

export function getPort(): number {
  const rawPort = process.env.PORT;
  if (!rawPort) return 3000;

  const port = parseInt(rawPort, 10);
  if (isNaN(port) || port < 0 || port > 65535) {
    throw new TypeError(`PORT must be a valid port number (not "${rawPort}")`);
  }
  return port;
}

export function getApiKeys(): Array<string> {
  let keyList = process.env.API_KEYS;
  if (!keyList) {
    if (process.env.NODE_ENV === "production") {
      throw new Error(
        "You must set API_KEYS to a comma-separated list of keys in production"
      );
    } else {
      keyList = "dev-key";
    }
  }

  return keyList
    .split(",")
    .map((key) => key.trim())
    .filter(Boolean);
}

export function getPlatform(): string {
  if (process.env.RENDER) {
    return "render";
  } else if (
    process.env.ECS_CONTAINER_METADATA_URI ||
    process.env.ECS_CONTAINER_METADATA_URI_V4
  ) {
    return "ecs";
  } else {
    return "";
  }
}

/**
 * Get a string identifier for host machine instance the app is running on.
 */
export function getHostInstance(): string {
  if (process.env.RENDER) {
    return `${process.env.RENDER_SERVICE_NAME}-${process.env.RENDER_INSTANCE_ID}`;
  } else {
    return os.hostname();
  }
}
