import { Pool } from "pg";
import { env } from "../env";

export const pool = env.DATABASE_URL
  ? new Pool({ connectionString: env.DATABASE_URL, max: 4 })
  : null;
