/**
 * Service exports
 */

export { CatalogService, type CatalogServiceOptions, type NamedKind } from './CatalogService.js'
export { QuoteBuilder } from './QuoteBuilder.js'
export { UserBuilder } from './UserBuilder.js'
export {
  FavoritesService,
  type FavoritesServiceOptions,
  type UserProfile,
} from './FavoritesService.js'
