export type AppConfig = {
  port: number;
  apiName: string;
  database: {
    url: string;
    tableName: string;
  };
  extraction: {
    apiKey?: string;
    model: string;
  };
};

export default (): AppConfig => ({
  port: Number(process.env.PORT) || 3000,
  apiName: process.env.API_NAME || 'incident-intake',
  database: {
    url: process.env.DATABASE_URL || 'postgres://localhost:5432/incidents',
    tableName: process.env.TABLE_NAME || 'incident_alerts',
  },
  extraction: {
    apiKey: process.env.OPENAI_API_KEY || undefined,
    model: process.env.EXTRACTION_MODEL || 'gpt-4o-mini',
  },
});
