export { closeDb, initDb, isDbInitialized, withConnection } from "./connection";
export { delegatedCredentials } from "./repos/delegated-credentials";
export { favoriteModels } from "./repos/favorite-models";
export type { CredentialSource, DelegatedCredentialRow, FavoriteModelRow } from "./types";
