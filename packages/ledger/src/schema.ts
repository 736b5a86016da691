export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS ledger_state (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS collections (
  collection_id INTEGER PRIMARY KEY,
  creator TEXT NOT NULL,
  name TEXT NOT NULL,
  description TEXT NOT NULL,
  max_supply INTEGER NOT NULL CHECK(max_supply > 0),
  current_supply INTEGER NOT NULL DEFAULT 0,
  mint_price TEXT NOT NULL,
  royalty_bps INTEGER NOT NULL CHECK(royalty_bps BETWEEN 0 AND 3000),
  is_open INTEGER NOT NULL,
  created_at_height INTEGER NOT NULL,
  metadata_locator TEXT NOT NULL,
  CHECK(current_supply BETWEEN 0 AND max_supply)
);

CREATE TABLE IF NOT EXISTS lattice_parameters (
  collection_id INTEGER PRIMARY KEY,
  dimensions INTEGER NOT NULL CHECK(dimensions >= 1),
  node_count INTEGER NOT NULL CHECK(node_count >= 2),
  connections_json TEXT NOT NULL,
  color_scheme TEXT NOT NULL,
  transformations_json TEXT NOT NULL,
  extra_params_json TEXT NOT NULL,
  FOREIGN KEY(collection_id) REFERENCES collections(collection_id)
);

CREATE TABLE IF NOT EXISTS tokens (
  collection_id INTEGER NOT NULL,
  token_index INTEGER NOT NULL CHECK(token_index >= 1),
  owner TEXT NOT NULL,
  seed TEXT NOT NULL,
  minted_at_height INTEGER NOT NULL,
  metadata_locator TEXT NOT NULL,
  PRIMARY KEY(collection_id, token_index),
  FOREIGN KEY(collection_id) REFERENCES collections(collection_id)
);

CREATE TABLE IF NOT EXISTS ownership_index (
  owner TEXT NOT NULL,
  collection_id INTEGER NOT NULL,
  token_index INTEGER NOT NULL,
  seq INTEGER NOT NULL,
  PRIMARY KEY(owner, collection_id, token_index)
);

CREATE TABLE IF NOT EXISTS listings (
  collection_id INTEGER NOT NULL,
  token_index INTEGER NOT NULL,
  seller TEXT NOT NULL,
  price TEXT NOT NULL,
  listed_at_height INTEGER NOT NULL,
  PRIMARY KEY(collection_id, token_index),
  FOREIGN KEY(collection_id, token_index) REFERENCES tokens(collection_id, token_index)
);

CREATE TABLE IF NOT EXISTS balances (
  account TEXT PRIMARY KEY,
  amount TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS activity (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  kind TEXT NOT NULL,
  collection_id INTEGER,
  token_index INTEGER,
  from_account TEXT,
  to_account TEXT,
  amount TEXT,
  height INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_collections_creator ON collections(creator);
CREATE INDEX IF NOT EXISTS idx_ownership_owner_seq ON ownership_index(owner, seq);
CREATE INDEX IF NOT EXISTS idx_tokens_owner ON tokens(owner);
CREATE INDEX IF NOT EXISTS idx_activity_token ON activity(collection_id, token_index);
CREATE INDEX IF NOT EXISTS idx_activity_height ON activity(height);
`;
