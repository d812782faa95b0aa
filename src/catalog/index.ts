/**
 * Catalog module.
 * Pure transformations over component catalog JSON. No browser access.
 */

export {
  parseCatalogJson,
  flattenComponents,
  findComponent,
  filterCategory,
  componentContext,
} from './components.js';
export { CatalogError } from './errors.js';
