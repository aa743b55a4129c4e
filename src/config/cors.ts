const DEFAULT_ORIGINS = ["http://localhost:5173", "http://127.0.0.1:5173", "http://localhost:5050"];

export function staticCorsOrigins(raw = "") {
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean)
    .concat(DEFAULT_ORIGINS);
}

// Check if an origin is allowed based on the static list.
export function isOriginAllowed(origin: string, staticOrigins: string[]) {
  try {
    const url = new URL(origin);
    const host = url.hostname.toLowerCase();

    // Always allow localhost / 127.0.0.1 on any port for dev/testing
    if (host === "localhost" || host === "127.0.0.1") return true;

    return staticOrigins.some((o) => o === origin || o === url.origin);
  } catch {
    return false;
  }
}
