import type { Command } from "commander";
import { listTools } from "../../tools/definitions.js";
import { createContext } from "../context.js";

export async function toolsCommand(command: Command): Promise<void> {
  const { config } = await createContext(command);
  console.log(JSON.stringify(listTools(config), null, 2));
}
