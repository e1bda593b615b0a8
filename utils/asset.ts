import { Asset } from "@stellar/stellar-sdk";

/** Resolves a market asset id (`native` or `CODE:ISSUER`) to a Stellar asset. */
export function getAssetFromId(id: string): Asset {
  const s = id.trim();
  if (s.toLowerCase() === "native") {
    return Asset.native();
  }
  const [code, issuer, ...rest] = s.split(":");
  if (!code || !issuer || rest.length > 0) {
    throw new Error(`Non-native asset requires CODE:ISSUER format, got "${id}"`);
  }
  // Asset codes are case-sensitive on the network
  return new Asset(code.trim(), issuer.trim());
}
