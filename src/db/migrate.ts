import { withPg } from "../pipeline/run_db";
import { runMigrations } from "./migrations";

async function main() {
  const applied = await withPg((c) => runMigrations(c));
  console.log(applied.length ? `Applied ${applied.join(", ")}` : "Schema up to date");
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
