import { getDb } from "../db";
import { eq, desc, sql, count } from "drizzle-orm";

export { getDb, eq, desc, sql, count };
