// 역할: MongoDB 기반 StagingStore 구현.

import { MongoClient, type Db } from "mongodb";
import type { StagedDocument } from "../types";
import type { StagingStore } from "./store";

export type MongoStagingHandle = {
  store: StagingStore;
  close: () => Promise<void>;
};

export function createMongoStagingStore(db: Db): StagingStore {
  return {
    async listCollectionNames() {
      const collections = await db.listCollections({}, { nameOnly: true }).toArray();
      return collections.map((collection) => collection.name).sort();
    },

    async *readCollection(name: string) {
      const cursor = db.collection(name).find({});
      try {
        for await (const doc of cursor) {
          const staged: StagedDocument = { ...doc };
          yield staged;
        }
      } finally {
        await cursor.close();
      }
    },

    async replaceCollection(name: string, docs: StagedDocument[]) {
      const collection = db.collection(name);
      await collection.deleteMany({});
      if (docs.length === 0) return 0;
      const result = await collection.insertMany(docs.map((doc) => ({ ...doc })));
      return result.insertedCount;
    },
  };
}

export async function openMongoStagingStore(
  uri: string,
  dbName: string,
): Promise<MongoStagingHandle> {
  const client = new MongoClient(uri);
  await client.connect();
  return {
    store: createMongoStagingStore(client.db(dbName)),
    close: () => client.close(),
  };
}
