import { countriesTable } from './countries.js';

export { countriesTable };

export const schema = {
  countriesTable,
};
