import mongoose from 'mongoose';
import { config } from './config';
import { logger } from './logger';

let isConnected = false;

export async function connectMongo(uri: string = config.mongoUri): Promise<typeof mongoose> {
  if (isConnected) return mongoose;
  mongoose.set('strictQuery', true);
  await mongoose.connect(uri, { dbName: config.mongoDbName });
  isConnected = true;
  logger.info('Mongo connected', { db: config.mongoDbName });
  return mongoose;
}

export async function disconnectMongo(): Promise<void> {
  if (!isConnected) return;
  await mongoose.disconnect();
  isConnected = false;
  logger.info('Mongo disconnected');
}
