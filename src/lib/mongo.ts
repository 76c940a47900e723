import mongoose from "mongoose";
import type { Logger } from "./logger";

export async function connectMongo(uri: string | undefined, logger: Logger) {
  if (!uri) throw new Error("MONGODB_URI missing");
  if (mongoose.connection.readyState === 1) return mongoose;
  await mongoose.connect(uri, { serverSelectionTimeoutMS: 5000 });
  logger.info("[mongo] connected");
  return mongoose;
}

export async function disconnectMongo() {
  if (mongoose.connection.readyState !== 0) await mongoose.disconnect();
}
