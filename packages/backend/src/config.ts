export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVEL_NAMES: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface Config {
  port: number;
  database_url: string;
  node_env: string;
  log_level: LogLevel;
  cors_origin: string;
  gmail_client_id: string;
  gmail_client_secret: string;
  gmail_refresh_token: string;
  gmail_owner_name: string;
  sync_max_messages: number;
  openai_api_key: string;
  openai_model: string;
  apify_api_token: string;
  apify_linkedin_actor: string;
}

function get_env(key: string, default_value?: string): string {
  const value = process.env[key];
  if (value === undefined) {
    if (default_value !== undefined) {
      return default_value;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function parse_log_level(value: string): LogLevel {
  return LOG_LEVEL_NAMES.find((level) => level === value) ?? 'info';
}

export function parse_positive_int(value: string, fallback: number): number {
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) || parsed < 1 ? fallback : parsed;
}

export function load_config(): Config {
  return {
    port: parse_positive_int(get_env('PORT', '5001'), 5001),
    database_url: get_env('DATABASE_URL'),
    node_env: get_env('NODE_ENV', 'development'),
    log_level: parse_log_level(get_env('LOG_LEVEL', 'info')),
    cors_origin: get_env('CORS_ORIGIN', 'http://localhost:3000'),
    gmail_client_id: get_env('GMAIL_CLIENT_ID', ''),
    gmail_client_secret: get_env('GMAIL_CLIENT_SECRET', ''),
    gmail_refresh_token: get_env('GMAIL_REFRESH_TOKEN', ''),
    gmail_owner_name: get_env('GMAIL_OWNER_NAME', 'you'),
    sync_max_messages: parse_positive_int(get_env('SYNC_MAX_MESSAGES', '200'), 200),
    openai_api_key: get_env('OPENAI_API_KEY', ''),
    openai_model: get_env('OPENAI_MODEL', 'gpt-4o-mini'),
    apify_api_token: get_env('APIFY_API_TOKEN', ''),
    apify_linkedin_actor: get_env('APIFY_LINKEDIN_ACTOR', 'apify/linkedin-profile-scraper'),
  };
}

export const config = load_config();
