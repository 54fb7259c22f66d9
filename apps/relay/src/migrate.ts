import { drizzle } from "drizzle-orm/postgres-js";
import { migrate } from "drizzle-orm/postgres-js/migrator";
import postgres from "postgres";

// Applies the migrations drizzle-kit generated into ./drizzle.
// Reads DATABASE_URL directly so it runs without the relay's other settings.
async function main(databaseUrl: string | undefined) {
  if (!databaseUrl) {
    throw new Error("DATABASE_URL is required");
  }
  const client = postgres(databaseUrl, { max: 1 });
  try {
    console.log("Applying relay migrations...");
    await migrate(drizzle(client), { migrationsFolder: "./drizzle" });
    console.log("Relay schema is up to date.");
  } finally {
    await client.end();
  }
}

main(process.env.DATABASE_URL).catch((err) => {
  console.error(err);
  process.exit(1);
});
