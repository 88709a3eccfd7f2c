import mongoose from 'mongoose';
import dotenv from 'dotenv';
import { logger } from '@/utils/logger';

dotenv.config();

interface DatabaseConfig {
  uri: string;
  options?: mongoose.ConnectOptions;
}

const defaultConfig: DatabaseConfig = {
  uri: process.env.MONGODB_URI || 'mongodb://localhost:27017/weather',
  options: {
    serverSelectionTimeoutMS: parseInt(process.env.MONGODB_SERVER_SELECTION_TIMEOUT_MS || '5000', 10),
  },
};

export const connectDB = async (config: DatabaseConfig = defaultConfig): Promise<typeof mongoose> => {
  try {
    await mongoose.connect(config.uri, config.options);
    return mongoose;
  } catch (error) {
    logger.error('MongoDB connection error:', error);
    throw error;
  }
};

export const disconnectDB = async (): Promise<void> => {
  await mongoose.disconnect();
};

mongoose.connection.on('connected', () => {
  logger.info('MongoDB connected');
});

mongoose.connection.on('error', (err) => {
  logger.error('MongoDB connection error:', err);
});

mongoose.connection.on('disconnected', () => {
  logger.info('MongoDB disconnected');
});

export default mongoose;
