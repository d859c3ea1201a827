import 'dotenv/config';
import postgres from 'postgres';
import { logger } from '../src/logger';

const connectionString = process.env.DATABASE_URL;
if (!connectionString) {
  throw new Error('DATABASE_URL environment variable is not set');
}

const sql = postgres(connectionString);

async function createEnum(name: string, values: string[]): Promise<void> {
  try {
    await sql.unsafe(`CREATE TYPE "public"."${name}" AS ENUM(${values.map((v) => `'${v}'`).join(', ')})`);
  } catch (e) {
    if (!(e instanceof Error) || !e.message.includes('already exists')) throw e;
  }
}

async function main() {
  await createEnum('call_direction', ['inbound', 'outbound']);
  await createEnum('call_state', ['initiated', 'ringing', 'connected', 'completed', 'failed', 'busy', 'no_answer']);
  await createEnum('popup_status', ['pending', 'sent', 'failed', 'retry', 'duplicate']);
  logger.info('Created enums');

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS "zoho_tokens" (
      "id" uuid PRIMARY KEY DEFAULT gen_random_uuid() NOT NULL,
      "user_id" varchar(100) NOT NULL,
      "zoho_user_id" varchar(100),
      "access_token" text NOT NULL,
      "refresh_token" text NOT NULL,
      "expires_at" timestamp NOT NULL,
      "api_domain" varchar(200),
      "is_active" boolean DEFAULT true NOT NULL,
      "created_at" timestamp DEFAULT now() NOT NULL,
      "updated_at" timestamp DEFAULT now() NOT NULL
    )
  `);
  logger.info('Created zoho_tokens table');

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS "extension_mappings" (
      "id" uuid PRIMARY KEY DEFAULT gen_random_uuid() NOT NULL,
      "extension" varchar(20) NOT NULL,
      "user_id" varchar(100) NOT NULL,
      "zoho_user_id" varchar(100),
      "is_active" boolean DEFAULT true NOT NULL,
      "created_at" timestamp DEFAULT now() NOT NULL,
      "updated_at" timestamp DEFAULT now() NOT NULL
    )
  `);
  logger.info('Created extension_mappings table');

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS "call_logs" (
      "id" uuid PRIMARY KEY DEFAULT gen_random_uuid() NOT NULL,
      "call_id" varchar(100) NOT NULL,
      "extension" varchar(20),
      "direction" "call_direction" NOT NULL,
      "state" "call_state" DEFAULT 'initiated' NOT NULL,
      "caller_number" varchar(40) DEFAULT '' NOT NULL,
      "called_number" varchar(40) DEFAULT '' NOT NULL,
      "normalized_phone" varchar(40),
      "contact" jsonb,
      "call_history_count" integer DEFAULT 0 NOT NULL,
      "start_time" timestamp,
      "end_time" timestamp,
      "duration_seconds" integer,
      "popup_sent" boolean DEFAULT false NOT NULL,
      "notes" text DEFAULT '' NOT NULL,
      "recording_url" text,
      "created_at" timestamp DEFAULT now() NOT NULL,
      "updated_at" timestamp DEFAULT now() NOT NULL
    )
  `);
  logger.info('Created call_logs table');

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS "popup_logs" (
      "id" uuid PRIMARY KEY DEFAULT gen_random_uuid() NOT NULL,
      "call_id" varchar(100) NOT NULL,
      "zoho_user_id" varchar(100) NOT NULL,
      "extension" varchar(20),
      "payload" jsonb NOT NULL,
      "status" "popup_status" DEFAULT 'pending' NOT NULL,
      "sent_at" timestamp DEFAULT now() NOT NULL,
      "response_time_ms" integer,
      "response_body" text,
      "retry_count" integer DEFAULT 0 NOT NULL,
      "error_message" text
    )
  `);
  logger.info('Created popup_logs table');

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS "vitalpbx_webhook_logs" (
      "id" uuid PRIMARY KEY DEFAULT gen_random_uuid() NOT NULL,
      "event_type" varchar(50) NOT NULL,
      "payload" jsonb NOT NULL,
      "processed" boolean DEFAULT false NOT NULL,
      "processed_at" timestamp,
      "error_message" text,
      "created_at" timestamp DEFAULT now() NOT NULL
    )
  `);
  logger.info('Created vitalpbx_webhook_logs table');

  // Create indexes (IF NOT EXISTS)
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS "zoho_tokens_zoho_user_idx" ON "zoho_tokens" USING btree ("zoho_user_id")`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS "zoho_tokens_active_idx" ON "zoho_tokens" USING btree ("is_active","expires_at")`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS "extension_mappings_extension_idx" ON "extension_mappings" USING btree ("extension","is_active")`);
  await sql.unsafe(`CREATE UNIQUE INDEX IF NOT EXISTS "call_logs_call_id_idx" ON "call_logs" USING btree ("call_id")`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS "call_logs_phone_idx" ON "call_logs" USING btree ("normalized_phone","state")`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS "call_logs_start_idx" ON "call_logs" USING btree ("start_time")`);
  await sql.unsafe(`CREATE UNIQUE INDEX IF NOT EXISTS "popup_logs_call_user_idx" ON "popup_logs" USING btree ("call_id","zoho_user_id")`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS "popup_logs_status_idx" ON "popup_logs" USING btree ("status","sent_at")`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS "vitalpbx_webhook_logs_created_idx" ON "vitalpbx_webhook_logs" USING btree ("created_at")`);
  logger.info('Created indexes');

  logger.info('Migration complete!');
  await sql.end();
}

main().catch((e: unknown) => {
  logger.error({ error: e instanceof Error ? e.message : String(e) }, 'Migration failed');
  process.exit(1);
});
