// Values are read once, after pre-start has loaded the .env file.

function toNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

const EnvVars = {
  NodeEnv: process.env.NODE_ENV || 'development',
  Port: toNumber(process.env.PORT, 8000),
  Database: {
    Url: process.env.DATABASE_URL || undefined,
    Name: process.env.DATABASE_NAME || undefined,
    TimeoutMs: toNumber(process.env.DATABASE_TIMEOUT_MS, 5000),
  },
  Crm: {
    ApiKey: process.env.HUBSPOT_API_KEY || undefined,
    BaseUrl: process.env.CRM_BASE_URL || 'https://api.hubapi.com',
    TimeoutMs: 6000,
  },
  SeedDemoData: process.env.SEED_DEMO_DATA === 'true',
  CorsOrigin: process.env.CORS_ORIGIN || '*',
} as const;

export default EnvVars;
