export type LinkProtocol = "vless" | "vmess" | "trojan";

export type ClientIdentifier = {
  protocol: LinkProtocol;
  /** Client UUID (vless, vmess) or password (trojan). */
  uuid: string | null;
  /** Remark from the link, usually the panel client's email. */
  email: string | null;
};

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function isUuid(value: string) {
  return UUID_PATTERN.test(value);
}

function safeDecode(value: string) {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

function remarkToEmail(remark: string | undefined | null) {
  if (!remark) return null;
  const decoded = safeDecode(remark.replace(/^#/, "")).trim();
  if (!decoded) return null;
  // Panels export remarks as "<inbound>-<email>"; keep the email part.
  const dash = decoded.lastIndexOf("-");
  const email = dash >= 0 ? decoded.slice(dash + 1).trim() : decoded;
  return email || null;
}

function parseUrlLink(protocol: "vless" | "trojan", link: string): ClientIdentifier | null {
  let url: URL;
  try {
    url = new URL(link);
  } catch {
    return null;
  }
  const user = safeDecode(url.username).trim();
  if (!user) return null;
  if (protocol === "vless" && !isUuid(user)) return null;
  return {
    protocol,
    uuid: user,
    email: remarkToEmail(url.hash),
  };
}

function parseVmessLink(link: string): ClientIdentifier | null {
  const payload = link.slice("vmess://".length).trim();
  if (!payload) return null;
  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(payload, "base64").toString("utf8"));
  } catch {
    return null;
  }
  if (!decoded || typeof decoded !== "object") return null;
  const id = "id" in decoded && typeof decoded.id === "string" ? decoded.id.trim() : "";
  if (!isUuid(id)) return null;
  const remark = "ps" in decoded && typeof decoded.ps === "string" ? decoded.ps : null;
  return { protocol: "vmess", uuid: id, email: remarkToEmail(remark) };
}

/**
 * Reads the client identifier out of a subscription link.
 * Returns null for anything that is not a vless, vmess or trojan link.
 */
export function extractClientIdentifier(input?: string | null): ClientIdentifier | null {
  if (!input) return null;
  const link = input.trim();
  const scheme = link.slice(0, link.indexOf("://")).toLowerCase();
  switch (scheme) {
    case "vless":
    case "trojan":
      return parseUrlLink(scheme, link);
    case "vmess":
      return parseVmessLink(link);
    default:
      return null;
  }
}

export function findSubscriptionLink(text?: string | null) {
  if (!text) return null;
  const match = text.match(/(?:vless|vmess|trojan):\/\/\S+/i);
  return match ? match[0] : null;
}
