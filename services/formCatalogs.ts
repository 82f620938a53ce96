/**
 * SHIPPED FORM CATALOGS
 *
 * Registries are compiled on first use and memoized for the process.
 */

import resectionCatalog from "../catalogs/dcisResection.json";
import summaryCatalog from "../catalogs/dcisSummary.json";
import { appLogger } from "./appLogger";
import { loadRegistry, registryStats, type FormRegistry } from "./formEngine";

export const FORM_NAMES = ["dcis-resection", "dcis-summary"] as const;
export type FormName = (typeof FORM_NAMES)[number];

const sources: Record<FormName, unknown> = {
  "dcis-resection": resectionCatalog,
  "dcis-summary": summaryCatalog,
};

const compiled = new Map<FormName, FormRegistry>();

export const isFormName = (value: string): value is FormName =>
  FORM_NAMES.some((name) => name === value);

/**
 * Registry for a shipped form. Throws CatalogError if the catalog is broken.
 */
export const getFormRegistry = (form: FormName): FormRegistry => {
  const cached = compiled.get(form);
  if (cached) return cached;

  const registry = loadRegistry(form, sources[form]);
  appLogger.info("form_registry_compiled", { form, ...registryStats(registry) });
  compiled.set(form, registry);
  return registry;
};
