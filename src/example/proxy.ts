import { defineRecord, enumCodec, field, t } from "../core/schema.js";

/**
 * Record edited by the bundled `recordtree` binary: a reverse-proxy
 * configuration with a list of backends and a header map.
 */

export const AUTH_MODES = ["static", "ldap"] as const;
export const AuthModeCodec = enumCodec("auth mode", AUTH_MODES);

export const BackendSchema = defineRecord("Backend", {
  hostname: field(t.string(), {
    tags: { recli: "id", usage: "DNS name or IP of the backend" },
  }),
  port: field(t.int("uint16"), { tags: { default: "2019" } }),
  weight: field(t.int("uint8"), {
    tags: { default: "1", usage: "Relative share of traffic" },
  }),
  zones: t.list(t.string()),
});

export const TlsSchema = defineRecord("Tls", {
  enabled: t.bool(),
  certFile: field(t.string(), { tags: { usage: "PEM certificate path" } }),
});

export const ProxyConfigSchema = defineRecord("ProxyConfig", {
  listenAddress: field(t.string(), {
    tags: { usage: "Address the proxy listens on", default: ":8080" },
  }),
  auth: field(t.text(AuthModeCodec), {
    tags: { usage: "static | ldap", default: "static" },
  }),
  readTimeoutS: field(t.float(), { tags: { default: "30" } }),
  tls: t.record(TlsSchema),
  backends: field(t.list(t.record(BackendSchema)), {
    tags: { usage: "Upstream servers" },
  }),
  headers: field(t.map(t.string(), t.string()), {
    tags: { usage: "Headers added to every proxied request" },
  }),
  _revision: t.int(),
});
