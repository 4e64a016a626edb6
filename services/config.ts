// services/config.ts
import "dotenv/config";
import { SUPPLIERS, SupplierId, isSupplierId } from "../types.js";
import { ImporterError } from "./errors.js";

export interface MouserConfig {
  apiKey: string | null;
  apiUrl: string;
  companyId: number | null;
}

export interface DigiKeyConfig {
  clientId: string | null;
  clientSecret: string | null;
  tokenUrl: string;
  productDetailsUrl: string;
  currency: string;
  language: string;
  location: string;
  companyId: number | null;
}

export interface DestinationConfig {
  baseUrl: string | null;
  token: string | null;
  autoCreateCategories: boolean;
}

export interface ImporterConfig {
  enabledSuppliers: SupplierId[];
  defaultCurrency: string;
  defaultLanguage: string;
  defaultCountry: string;
  requestTimeoutMs: number;
  mouser: MouserConfig;
  digikey: DigiKeyConfig;
  destination: DestinationConfig;
}

type Env = Record<string, string | undefined>;

const PLACEHOLDERS = new Set(["changeme", "placeholder"]);

function secret(env: Env, name: string): string | null {
  const value = env[name]?.trim();
  if (!value || PLACEHOLDERS.has(value.toLowerCase())) return null;
  return value;
}

function intOrNull(env: Env, name: string): number | null {
  const value = env[name]?.trim();
  if (!value) return null;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : null;
}

function bool(env: Env, name: string, fallback: boolean): boolean {
  const value = env[name];
  if (value === undefined) return fallback;
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

function suppliers(env: Env): SupplierId[] {
  const raw = env.IMPORTER_SUPPLIERS;
  if (!raw) return [...SUPPLIERS];

  const enabled: SupplierId[] = [];
  for (const entry of raw.split(",")) {
    const id = entry.trim().toLowerCase();
    if (!id) continue;
    if (!isSupplierId(id)) {
      console.warn(`[config] Unknown importer supplier '${id}' requested; skipping`);
      continue;
    }
    if (!enabled.includes(id)) enabled.push(id);
  }
  return enabled;
}

/**
 * Reads the importer configuration from the environment.
 * Missing credentials are kept as null; the component that needs them
 * raises `Misconfigured` when it is used.
 */
export function loadImporterConfig(env: Env = process.env): ImporterConfig {
  const defaultCurrency = (env.DEFAULT_CURRENCY || "EUR").toUpperCase();
  const defaultLanguage = env.DEFAULT_LANGUAGE || "en";
  const defaultCountry = env.DEFAULT_COUNTRY || "PT";
  const timeout = intOrNull(env, "IMPORTER_REQUEST_TIMEOUT_MS");

  return {
    enabledSuppliers: suppliers(env),
    defaultCurrency,
    defaultLanguage,
    defaultCountry,
    requestTimeoutMs: timeout && timeout > 0 ? timeout : 30_000,
    mouser: {
      apiKey: secret(env, "MOUSER_API_KEY"),
      apiUrl: env.MOUSER_API_URL || "https://api.mouser.com/api/v1/search/partnumber",
      companyId: intOrNull(env, "INVENTREE_MOUSER_COMPANY_ID")
    },
    digikey: {
      clientId: secret(env, "DIGIKEY_CLIENT_ID"),
      clientSecret: secret(env, "DIGIKEY_CLIENT_SECRET"),
      tokenUrl: env.DIGIKEY_TOKEN_URL || "https://api.digikey.com/v1/oauth2/token",
      productDetailsUrl:
        env.DIGIKEY_PRODUCT_DETAILS_URL || "https://api.digikey.com/products/v4/search",
      currency: (env.DIGIKEY_CURRENCY || defaultCurrency).toUpperCase(),
      language: env.DIGIKEY_LANGUAGE || defaultLanguage,
      location: env.DIGIKEY_LOCATION || defaultCountry,
      companyId: intOrNull(env, "INVENTREE_DIGIKEY_COMPANY_ID")
    },
    destination: {
      baseUrl: env.INVENTREE_BASE_URL ? env.INVENTREE_BASE_URL.replace(/\/+$/, "") : null,
      token: secret(env, "INVENTREE_TOKEN"),
      autoCreateCategories: bool(env, "IMPORTER_AUTO_CREATE_CATEGORIES", false)
    }
  };
}

export function requireEnabled(config: ImporterConfig, supplier: SupplierId): void {
  if (!config.enabledSuppliers.includes(supplier)) {
    throw new ImporterError("Misconfigured", `Supplier '${supplier}' is not enabled`);
  }
}
