import { registerAs } from '@nestjs/config';
import { env } from 'node:process';

export default registerAs('gcp', () => ({
  bucketName: env.GCP_BUCKET_NAME,
  projectId: env.GCP_PROJECT,
  location: env.GCP_LOCATION,
  model: env.GEMINI_MODEL,
  temperature: env.GEMINI_TEMPERATURE
    ? parseFloat(env.GEMINI_TEMPERATURE)
    : 0.2,
}));
