#!/usr/bin/env node
import fs from "fs";
import { loadConfig } from "./config.js";
import { Diagnostics } from "./errors.js";
import { primitiveAssets } from "./primitives.js";
import { loadPipeline } from "./sources.js";
import { formatComponentsDetail, formatDecomposition, formatTree } from "./summary.js";
import { codePoints } from "./util.js";

async function main() {
  const [configPath, characterArg, outJson] = process.argv.slice(2);
  if (!configPath || !characterArg) {
    console.error("Usage: node dist/src/main.js <config.yaml> <characters> [out.json]");
    process.exit(1);
  }
  const diagnostics = new Diagnostics();
  const { engine, manifest, overrides } = loadPipeline(loadConfig(configPath), diagnostics, (m) => console.error(m));

  const characters = codePoints(characterArg).filter((c) => c.trim() !== "");
  const results = characters.map((character) => {
    const tree = engine.decomposeAndResolve(character, overrides);
    return {
      character,
      decomposition: formatDecomposition(tree),
      components_detail: formatComponentsDetail(tree),
      primitives: Object.fromEntries(primitiveAssets(tree, manifest)),
      tree,
    };
  });

  if (outJson) {
    fs.writeFileSync(outJson, JSON.stringify(results, null, 2), "utf8");
  } else {
    for (const r of results) {
      process.stdout.write(`${formatTree(r.tree)}\n`);
      if (r.decomposition) process.stdout.write(`  = ${r.decomposition}\n`);
      if (r.components_detail) process.stdout.write(`  ${r.components_detail}\n`);
      for (const [ch, asset] of Object.entries(r.primitives)) process.stdout.write(`  ${ch} -> ${asset}\n`);
    }
  }
  console.error(`main: characters=${results.length} ${diagnostics.summary()}`);
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
