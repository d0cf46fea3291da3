import dotenv from 'dotenv';
import { AppConfig, RemoteProvider } from '../types/index.js';

dotenv.config();

function parseProvider(raw: string | undefined): RemoteProvider {
  return raw?.trim().toLowerCase() === 'couchdb' ? 'couchdb' : 's3';
}

function optional(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    storage: {
      provider: parseProvider(env.REMOTE_PROVIDER),
      objectName: env.NOTES_OBJECT_NAME || 'notes.json',
      localFile: env.LOCAL_NOTES_FILE || 'local_notes.json',
      setupBucket: optional(env.SETUP_BUCKET),
      s3: {
        region: env.S3_REGION || 'us-east-1',
        endpoint: optional(env.S3_ENDPOINT),
        accessKeyId: optional(env.S3_ACCESS_KEY),
        secretAccessKey: optional(env.S3_SECRET_KEY),
        forcePathStyle: env.S3_FORCE_PATH_STYLE === 'true',
      },
      couchdb: {
        url: env.COUCHDB_URL || 'http://localhost:5984',
        username: optional(env.COUCHDB_USERNAME),
        password: optional(env.COUCHDB_PASSWORD),
      },
    },
    server: {
      port: parseInt(env.PORT || '5000', 10),
      host: env.HOST || '0.0.0.0',
    },
    apiKey: optional(env.API_KEY),
  };
}
