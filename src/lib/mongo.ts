/**
 * MongoDB connection helpers
 */

import mongoose from 'mongoose';
import { env } from '../config/env';

export const connectDB = async (uri: string = env.MONGODB_URI): Promise<void> => {
  mongoose.connection.on('error', (error) => {
    console.error('MongoDB error:', error.message);
  });

  await mongoose.connect(uri);
  console.log(`✅ MongoDB connected (${mongoose.connection.name})`);
};

export const disconnectDB = async (): Promise<void> => {
  if (mongoose.connection.readyState !== 0) {
    await mongoose.disconnect();
    console.log('MongoDB disconnected');
  }
};
