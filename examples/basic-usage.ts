/**
 * Basic Usage Example
 *
 * Validates, formats and explains a few queries with the qshape SDK.
 * Run with: npm run example
 */

import { describeQuery, formatQuery, formatQueryError, parseQuery, validate } from "@qshape/sdk";

function main(): void {
  // VALID: nested namespaces with filters, ordering and cursor pagination
  console.log("🔍 Validating a nested query...");
  const outcome = validate({
    goals: {
      $: {
        where: { or: [{ status: "open" }, { priority: { $gte: 8 } }] },
        order: { createdAt: "desc" },
        first: 10,
      },
      todos: {
        $: { where: { done: false }, fields: ["title"] },
      },
    },
  });

  if (outcome.status !== "ok") {
    throw new Error("Expected the nested query to be valid");
  }
  console.log(`✅ ${outcome.query.namespaces.length} top-level namespace(s)`);

  // EXPLAIN: human-readable outline
  console.log("\n📋 Outline:");
  for (const line of describeQuery(outcome.query)) {
    console.log(`   ${line}`);
  }

  // FORMAT: canonical InstaQL, ready to send
  console.log("\n✏️  Canonical form:");
  console.log(formatQuery(outcome.query));

  // DEFERRED: a query that is not ready yet
  console.log("⏳ Validating null...");
  console.log(`✅ Status: ${validate(null).status}`);

  // INVALID: arrays where objects are expected
  console.log("\n🚫 Validating an invalid query...");
  const rejected = validate({ goals: { $: { where: { or: { status: "open" } } } } });
  if (rejected.status === "error") {
    console.log(`✅ Rejected: ${formatQueryError(rejected.error)}`);
  }

  // THROWING FORM: parseQuery raises QueryValidationError
  console.log("\n🚫 parseQuery on nested pagination...");
  try {
    parseQuery({ goals: { todos: { $: { limit: 5 } } } });
  } catch (err) {
    console.log(`✅ Threw: ${err instanceof Error ? err.message : String(err)}`);
  }

  console.log("\n✅ Example completed successfully!");
}

main();
