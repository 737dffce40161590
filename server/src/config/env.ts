import dotenv from 'dotenv';

dotenv.config();

function intFromEnv(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export const env = {
  nodeEnv: process.env.NODE_ENV ?? 'development',
  port: intFromEnv(process.env.PORT, 3001),
  corsOrigin: process.env.CORS_ORIGIN || '*',
  roundDurationSeconds: intFromEnv(process.env.ROUND_DURATION_SECONDS, 80),
  maxUsernameLength: intFromEnv(process.env.MAX_USERNAME_LENGTH, 20),
};
