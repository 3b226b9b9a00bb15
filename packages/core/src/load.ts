import { readFile } from "node:fs/promises";
import type { PetriNetModel } from "./model.js";
import { parseModel } from "./parser.js";
import { buildTree } from "./xml.js";

export function parsePnml(text: string): PetriNetModel {
  return parseModel(buildTree(text));
}

export async function loadPnmlFile(filePath: string): Promise<PetriNetModel> {
  const text = await readFile(filePath, "utf8");
  return parsePnml(text);
}
