export { createDatabase, closeDatabase } from "./connection.js";
export { migrate } from "./migrate.js";
export * from "./schema.js";
