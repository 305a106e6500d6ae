import "dotenv/config";
import { generateKeyPairSync } from "crypto";
import { Chain } from "../core/chain.js";
import { loadConfig } from "../config.js";

const chain = new Chain(loadConfig());
const { privateKey } = generateKeyPairSync("ed25519");

for (let i = 1; i <= 5; i++) {
  const record = chain.push(
    JSON.stringify({ asset: "artwork-7", owner: `user-${i}`, transfer: i }),
    { signingKey: privateKey }
  );
  console.log(`Appended #${record.index} ${record.selfDigest.slice(0, 16)}...`);
}

console.log("Verifying clean chain...");
console.log(chain.verify() ? "OK" : "FAILED");

// Tamper: flip one bit of record #4's stored payload
const target = chain.at(4);
if (target) {
  target.payload[0] = (target.payload[0] ?? 0) ^ 1;
}

console.log("Verifying tampered chain...");
const report = chain.inspect();
if (report.valid) {
  console.log("OK");
} else {
  for (const failure of report.failures) {
    console.error(`  #${failure.index} [${failure.check}] ${failure.message}`);
  }
}
