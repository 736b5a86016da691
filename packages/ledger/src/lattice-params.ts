import type { LedgerDatabase } from "./db";
import type { LatticeParameters, LatticeParametersInput } from "./types";
import { latticeParametersSchema } from "./validation";

interface LatticeParametersRow {
  collectionId: number;
  dimensions: number;
  nodeCount: number;
  connectionsJson: string;
  colorScheme: string;
  transformationsJson: string;
  extraParamsJson: string;
}

/**
 * Structural parameters are part of a lattice's identity: written once when the
 * collection is created and never updated.
 */
export class LatticeParameterStore {
  constructor(private readonly db: LedgerDatabase) {}

  put(collectionId: number, params: LatticeParametersInput): void {
    this.db
      .prepare(
        `INSERT INTO lattice_parameters(
          collection_id, dimensions, node_count, connections_json, color_scheme,
          transformations_json, extra_params_json
        ) VALUES(?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        collectionId,
        params.dimensions,
        params.nodeCount,
        JSON.stringify(params.connections),
        params.colorScheme,
        JSON.stringify(params.transformations),
        JSON.stringify(params.extraParams),
      );
  }

  get(collectionId: number): LatticeParameters | null {
    const row = this.db
      .prepare(
        `SELECT
          collection_id AS collectionId,
          dimensions,
          node_count AS nodeCount,
          connections_json AS connectionsJson,
          color_scheme AS colorScheme,
          transformations_json AS transformationsJson,
          extra_params_json AS extraParamsJson
         FROM lattice_parameters
         WHERE collection_id = ?`,
      )
      .get(collectionId) as LatticeParametersRow | undefined;

    if (!row) {
      return null;
    }

    return {
      collectionId: row.collectionId,
      dimensions: row.dimensions,
      nodeCount: row.nodeCount,
      connections: latticeParametersSchema.shape.connections.parse(JSON.parse(row.connectionsJson)),
      colorScheme: row.colorScheme,
      transformations: latticeParametersSchema.shape.transformations.parse(JSON.parse(row.transformationsJson)),
      extraParams: latticeParametersSchema.shape.extraParams.parse(JSON.parse(row.extraParamsJson)),
    };
  }
}
