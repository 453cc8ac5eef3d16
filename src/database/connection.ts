import mongoose, { type ConnectOptions } from 'mongoose';

import { env } from '../config/index.js';
import { logger } from '../lib/logger.js';

const RECONNECT_DELAY_MS = 2_000;
const MAX_RETRIES = 5;

let connectionPromise: Promise<typeof mongoose> | null = null;
let listenersRegistered = false;

function registerConnectionListeners(): void {
  if (listenersRegistered) {
    return;
  }

  const connection = mongoose.connection;

  connection.on('connected', () => {
    logger.info('MongoDB connection established');
  });

  connection.on('reconnected', () => {
    logger.warn('MongoDB connection re-established');
  });

  connection.on('disconnected', () => {
    logger.warn('MongoDB connection lost');
  });

  connection.on('error', error => {
    logger.error({ error }, 'MongoDB connection error');
  });

  listenersRegistered = true;
}

const connectOptions: ConnectOptions = {
  autoIndex: false,
  maxPoolSize: env.MONGO_MAX_POOL_SIZE,
  serverSelectionTimeoutMS: env.MONGO_SERVER_SELECTION_TIMEOUT_MS,
  retryReads: true,
  retryWrites: true
};

async function connectWithRetry(): Promise<typeof mongoose> {
  registerConnectionListeners();

  for (let attempt = 1; ; attempt++) {
    try {
      await mongoose.connect(env.MONGO_URI, connectOptions);
      return mongoose;
    } catch (error) {
      logger.error({ attempt, error }, 'MongoDB connection attempt failed');
      if (attempt >= MAX_RETRIES) {
        connectionPromise = null;
        throw error;
      }
      await new Promise(resolve => setTimeout(resolve, RECONNECT_DELAY_MS * attempt));
    }
  }
}

export async function connectDatabase(): Promise<typeof mongoose> {
  if (mongoose.connection.readyState === 1) {
    return mongoose;
  }

  if (!connectionPromise) {
    connectionPromise = connectWithRetry();
  }

  return connectionPromise;
}

export async function disconnectDatabase(): Promise<void> {
  if (mongoose.connection.readyState !== 0) {
    await mongoose.disconnect();
    connectionPromise = null;
  }
}

export async function checkDatabaseHealth(): Promise<boolean> {
  try {
    const conn = await connectDatabase();
    const db = conn.connection.db;
    if (!db) {
      throw new Error('Database connection not available');
    }
    await db.admin().command({ ping: 1 });
    return true;
  } catch (error) {
    logger.error({ error }, 'MongoDB health check failed');
    return false;
  }
}
