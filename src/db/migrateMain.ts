/**
 * Migration entrypoint: `npm run migrate`
 */

import "dotenv/config";
import { runMigrations } from "./migrate";

runMigrations();
