import mongoose from 'mongoose';
import { logger } from './logger';

export const connectDB = async (databaseUrl: string): Promise<void> => {
  try {
    await mongoose.connect(databaseUrl);
    logger.info('MongoDB connected successfully via Mongoose');
  } catch (error: unknown) {
    const msg = error instanceof Error ? error.message : String(error);
    logger.error('MongoDB connection failed: %s', msg);
    logger.error(
      'Make sure MongoDB is running. DATABASE_URL=%s',
      databaseUrl.replace(/\/\/[^@]+@/, '//***@') // hide credentials in log
    );
    process.exit(1);
  }
};

export const disconnectDB = async (): Promise<void> => {
  await mongoose.disconnect();
};

export default mongoose;
