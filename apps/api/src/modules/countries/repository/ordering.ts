import type { Country, CountrySort } from '@countryfx/types';

function byName(a: Country, b: Country): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/** Mirrors `estimated_gdp <dir> nulls last, name asc`. */
export function compareCountries(sort: CountrySort | undefined) {
  return (a: Country, b: Country): number => {
    if (!sort) return byName(a, b);
    const ga = a.estimatedGdp === null ? null : Number(a.estimatedGdp);
    const gb = b.estimatedGdp === null ? null : Number(b.estimatedGdp);
    if (ga === null && gb === null) return byName(a, b);
    if (ga === null) return 1;
    if (gb === null) return -1;
    const diff = sort === 'gdp_desc' ? gb - ga : ga - gb;
    return diff !== 0 ? diff : byName(a, b);
  };
}
