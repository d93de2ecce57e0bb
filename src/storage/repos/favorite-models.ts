import { withConnection } from "../connection";
import type { FavoriteModelRow } from "../types";

export const favoriteModels = {
  list: (): FavoriteModelRow[] => {
    return withConnection(
      (conn) =>
        conn
          .prepare(`SELECT * FROM favorite_models ORDER BY position ASC, added_at ASC`)
          .all() as FavoriteModelRow[],
    );
  },
  count: (): number => {
    return withConnection((conn) => {
      const row = conn.prepare(`SELECT COUNT(*) AS total FROM favorite_models`).get() as {
        total: number;
      };
      return row.total;
    });
  },
  /** Rewrites the whole ordered list in one transaction, keeping `added_at` for ids already present. */
  replaceAll: (modelIds: readonly string[]) => {
    return withConnection((conn) => {
      const now = new Date().toISOString();
      const previous = new Map(
        (conn.prepare(`SELECT * FROM favorite_models`).all() as FavoriteModelRow[]).map((row) => [
          row.model_id,
          row.added_at,
        ]),
      );
      const insert = conn.prepare(
        `INSERT INTO favorite_models (model_id, position, added_at) VALUES ($model_id, $position, $added_at)`,
      );
      conn.transaction(() => {
        conn.prepare(`DELETE FROM favorite_models`).run();
        modelIds.forEach((modelId, position) => {
          insert.run({ model_id: modelId, position, added_at: previous.get(modelId) ?? now });
        });
      })();
    });
  },
};
