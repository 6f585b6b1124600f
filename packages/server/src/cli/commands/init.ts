/**
 * init command - creates testbridge.config.json
 */

import { writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import kleur from "kleur";
import { CONFIG_FILENAME, DEFAULT_CONFIG } from "@testbridge/shared";

function alreadyExists(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "EEXIST";
}

export async function initCommand(dir = "."): Promise<void> {
  const configPath = resolve(process.cwd(), dir, CONFIG_FILENAME);

  try {
    await writeFile(
      configPath,
      JSON.stringify(DEFAULT_CONFIG, null, 2) + "\n",
      { encoding: "utf-8", flag: "wx" }
    );
  } catch (error) {
    if (alreadyExists(error)) {
      console.log(kleur.yellow(`⚠ ${CONFIG_FILENAME} already exists`));
      return;
    }
    throw error;
  }

  console.log(kleur.green(`✅ Created ${CONFIG_FILENAME}`));
  console.log("\nNext steps:");
  console.log(`  1. Edit ${CONFIG_FILENAME} to set the base commands for your project`);
  console.log("  2. Try: npx testbridge compile rspec spec/models/user_spec.rb:37");
}
