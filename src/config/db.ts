import { MongoClient, Db } from "mongodb";
import type { MongoClientOptions } from "mongodb";
import { loadAppConfig } from "./app.config";
const logger = console;

const options: MongoClientOptions = {
    tls: false,
    connectTimeoutMS: 20000,
    socketTimeoutMS: 60000,
    serverSelectionTimeoutMS: 10000,
    maxPoolSize: 10,
};

let client: MongoClient | null = null;
let database: Db | null = null;

class DatabaseConfig {
    static async connectToDatabase(retries = 5, delay = 2000): Promise<Db> {
        if (database) {
            logger.info(`Database already connected: ${database.databaseName}`);
            return database;
        }

        const { mongoUri, dbName } = loadAppConfig();
        if (!mongoUri) {
            throw new Error("MONGODB_URI environment variable is not set.");
        }
        if (!dbName) {
            throw new Error("DB_NAME environment variable is not set.");
        }

        for (let attempt = 1; attempt <= retries; attempt++) {
            try {
                client = new MongoClient(mongoUri, options);
                await client.connect();
                database = client.db(dbName);
                logger.info("Database connected successfully: ", database.databaseName);
                return database;
            } catch (error) {
                logger.error(`Database connection attempt ${attempt} failed: ${error}`);
                if (attempt < retries) {
                    await new Promise(res => setTimeout(res, delay));
                }
            }
        }
        throw new Error(`Failed to connect to database after ${retries} attempts.`);
    }

    static async getDatabase(): Promise<Db> {
        if (!database) {
            return await DatabaseConfig.connectToDatabase();
        }
        return database;
    }

    static async closeConnection(): Promise<void> {
        if (client) {
            await client.close();
            logger.info("Database connection closed.");
            client = null;
            database = null;
        }
    }
}

export default DatabaseConfig;
