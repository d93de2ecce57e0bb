export { FavoritesService } from "./service";
