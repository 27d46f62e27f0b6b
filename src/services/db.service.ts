import DatabaseConfig from "../config/db";
import type { Document, Filter, WithId } from "mongodb";

/**
 * Database Service - thin read helpers over the shared MongoDB connection
 */
class DbService {
    static async getManyData<T extends Document>(collectionName: string, query: Filter<T>, projection?: Document): Promise<WithId<T>[]> {
        try {
            const db = await DatabaseConfig.getDatabase();
            const cursor = db.collection<T>(collectionName).find(query, { projection });
            const result: WithId<T>[] = [];
            for await (const doc of cursor) {
                result.push(doc);
            }
            return result;
        } catch (error) {
            const message = error instanceof Error ? error.message : "Unknown Error occurred in getManyData";
            throw new Error(message);
        }
    }
}

export default DbService;
