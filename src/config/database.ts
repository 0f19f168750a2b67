import mongoose from "mongoose";
import { StorageError, errorMessage } from "../utils/errorHandler.js";
import { logger } from "../utils/logger.js";

export const connectDB = async (uri: string, connectTimeoutMs: number = 5000): Promise<void> => {
    if (mongoose.connection.readyState === 1) return;

    try {
        logger.debug('[DB] Connecting to MongoDB...', { uri });

        const conn = await mongoose.connect(uri, {
            serverSelectionTimeoutMS: connectTimeoutMs, // Fail fast when the store is down
            socketTimeoutMS: 45000
        });

        if (!conn.connection.db) {
            throw new Error('Database connection not established');
        }
        logger.debug('[DB] Connected', { database: conn.connection.db.databaseName });
    } catch (error) {
        throw new StorageError(`Cannot reach the continuity store at ${uri}: ${errorMessage(error)}`);
    }
};

export const disconnectDB = async (): Promise<void> => {
    if (mongoose.connection.readyState !== 0) {
        await mongoose.disconnect();
    }
};
