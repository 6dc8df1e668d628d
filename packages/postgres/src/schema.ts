import type { Queryable } from './queryable';

export const SCHEMA_VERSION = '1.0.0';

export const schema = `
-- ============================================
-- Tidewater Postgres Schema v${SCHEMA_VERSION}
-- ============================================

-- Flow definitions (every version is kept)
CREATE TABLE IF NOT EXISTS tw_flows (
  id              TEXT NOT NULL,
  version         TEXT NOT NULL,
  name            TEXT,
  definition      JSONB NOT NULL,
  active          BOOLEAN NOT NULL DEFAULT TRUE,
  created_at      BIGINT NOT NULL,
  PRIMARY KEY (id, version)
);

CREATE INDEX IF NOT EXISTS idx_tw_flows_id ON tw_flows(id);

-- Flow instances
CREATE TABLE IF NOT EXISTS tw_instances (
  id               TEXT PRIMARY KEY,
  flow_id          TEXT NOT NULL,
  flow_version     TEXT NOT NULL,
  contact_id       TEXT NOT NULL,
  cause_id         TEXT NOT NULL,
  cause            JSONB NOT NULL,
  status           TEXT NOT NULL CHECK (status IN ('running', 'waiting_delay', 'waiting_event', 'completed', 'goal_reached', 'failed')),
  pointer          JSONB NOT NULL,
  wake_at          BIGINT,
  waiting_for      JSONB,
  delay_entered_at BIGINT,
  failure          JSONB,
  retry            JSONB,
  variables        JSONB NOT NULL DEFAULT '{}',
  step_count       INTEGER NOT NULL DEFAULT 0,
  history          JSONB,
  entered_at       BIGINT NOT NULL,
  created_at       BIGINT NOT NULL,
  updated_at       BIGINT NOT NULL,
  ended_at         BIGINT
);

-- At most one live instance per (contact, flow)
CREATE UNIQUE INDEX IF NOT EXISTS idx_tw_inst_live ON tw_instances(contact_id, flow_id)
  WHERE status IN ('running', 'waiting_delay', 'waiting_event');
CREATE INDEX IF NOT EXISTS idx_tw_inst_contact ON tw_instances(contact_id);
CREATE INDEX IF NOT EXISTS idx_tw_inst_status ON tw_instances(status);
CREATE INDEX IF NOT EXISTS idx_tw_inst_wake ON tw_instances(wake_at) WHERE wake_at IS NOT NULL;

-- Completion groups
CREATE TABLE IF NOT EXISTS tw_completion_groups (
  cause_id         TEXT PRIMARY KEY,
  parent_cause_id  TEXT,
  contact_id       TEXT NOT NULL,
  resolved         BOOLEAN NOT NULL DEFAULT FALSE,
  state            JSONB NOT NULL,
  created_at       BIGINT NOT NULL,
  resolved_at      BIGINT
);

CREATE INDEX IF NOT EXISTS idx_tw_groups_open ON tw_completion_groups(created_at) WHERE NOT resolved;

-- Contacts and their properties
CREATE TABLE IF NOT EXISTS tw_contacts (
  id              TEXT PRIMARY KEY,
  created_at      BIGINT NOT NULL
);

CREATE TABLE IF NOT EXISTS tw_contact_properties (
  contact_id      TEXT NOT NULL REFERENCES tw_contacts(id) ON DELETE CASCADE,
  key             TEXT NOT NULL,
  value           JSONB,
  updated_at      BIGINT NOT NULL,
  PRIMARY KEY (contact_id, key)
);

-- Committed property changes
CREATE TABLE IF NOT EXISTS tw_property_changes (
  id               TEXT PRIMARY KEY,
  seq              BIGSERIAL,
  contact_id       TEXT NOT NULL,
  key              TEXT NOT NULL,
  old_value        JSONB,
  new_value        JSONB,
  parent_cause_id  TEXT,
  timestamp        BIGINT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_tw_changes_contact ON tw_property_changes(contact_id, seq);

-- Contact events (append-only)
CREATE TABLE IF NOT EXISTS tw_events (
  id               TEXT PRIMARY KEY,
  seq              BIGSERIAL,
  contact_id       TEXT NOT NULL,
  type             TEXT NOT NULL,
  payload          JSONB NOT NULL DEFAULT '{}',
  parent_cause_id  TEXT,
  timestamp        BIGINT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_tw_events_contact ON tw_events(contact_id, seq);
CREATE INDEX IF NOT EXISTS idx_tw_events_type ON tw_events(contact_id, type);

-- One-shot trigger firings
CREATE TABLE IF NOT EXISTS tw_trigger_ledger (
  flow_id         TEXT NOT NULL,
  version         TEXT NOT NULL,
  fired_at        BIGINT NOT NULL,
  PRIMARY KEY (flow_id, version)
);
`;

/**
 * Apply schema to database.
 */
export async function applySchema(db: Queryable): Promise<void> {
  await db.query(schema);
}
