/**
 * Persona & Region Catalog
 *
 * Records use the canonical ids (Chinese labels); analysts may filter with
 * either the id or any alias. Matching is case-insensitive on both sides.
 */

export type PriceTier = 'PRICE_SENSITIVE' | 'RESILIENT';

interface CatalogEntry {
  id: string;
  label: string;
  aliases: readonly string[];
}

export interface PersonaProfile extends CatalogEntry {
  tier: PriceTier;
}

export type RegionProfile = CatalogEntry;

export const PERSONAS: readonly PersonaProfile[] = [
  {
    id: '新鮮人',
    label: 'Fresh_Grad',
    aliases: ['fresh_grad', 'fresh_graduate', 'fresh grad'],
    tier: 'PRICE_SENSITIVE',
  },
  {
    id: 'FinTech家庭',
    label: 'FinTech_Family',
    aliases: ['fintech_family', 'fintech family'],
    tier: 'RESILIENT',
  },
];

export const REGIONS: readonly RegionProfile[] = [
  { id: '台北', label: 'Taipei', aliases: ['taipei'] },
  { id: '台南', label: 'Tainan', aliases: ['tainan'] },
];

const norm = (value: string): string => value.trim().toLowerCase();

function lookup<T extends CatalogEntry>(catalog: readonly T[], value: string): T | undefined {
  const needle = norm(value);
  return catalog.find(
    (entry) =>
      norm(entry.id) === needle ||
      norm(entry.label) === needle ||
      entry.aliases.some((alias) => norm(alias) === needle)
  );
}

function canonical(catalog: readonly CatalogEntry[], value: string): string {
  return norm(lookup(catalog, value)?.id ?? value);
}

export function resolvePersona(value: string): PersonaProfile | undefined {
  return lookup(PERSONAS, value);
}

export function resolveRegion(value: string): RegionProfile | undefined {
  return lookup(REGIONS, value);
}

/**
 * Unknown personas fall into the resilient tier.
 */
export function personaTier(group: string): PriceTier {
  return resolvePersona(group)?.tier ?? 'RESILIENT';
}

export function matchesPersona(group: string, filter: string): boolean {
  return canonical(PERSONAS, group) === canonical(PERSONAS, filter);
}

export function matchesRegion(region: string, filter: string): boolean {
  return canonical(REGIONS, region) === canonical(REGIONS, filter);
}
