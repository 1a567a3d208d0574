import { pino } from "pino";
import { MemoryTicketStore } from "../store/memory.js";
import { createImportService } from "../services/imports.js";
import { createClassificationService } from "../services/classification.js";

const TICKET_COUNT = Number(process.env.BENCH_TICKETS || 5000);
const ITERATIONS = Number(process.env.BENCH_ITERATIONS || 20);

const header = "customer_id,customer_email,customer_name,subject,description,category,priority,tags,source,browser,device_type";
const subjects = ["Cannot login", "Invoice question", "App crashes on save", "Add export option", "Slow sync"];

const lines = [header];
for (let i = 0; i < TICKET_COUNT; i++) {
  const subject = subjects[i % subjects.length];
  lines.push(
    `CUST-${i},user${i}@example.com,Bench User ${i},${subject} #${i},Benchmark ticket number ${i} for load testing,other,medium,"bench,load",api,Chrome,desktop`
  );
}
const csv = Buffer.from(lines.join("\n"), "utf8");

const store = new MemoryTicketStore();
const logger = pino({ level: "silent" });
const imports = createImportService({ store, logger });
const classification = createClassificationService({ store, logger });

console.log(`Importing ${TICKET_COUNT} tickets from CSV (${csv.length} bytes)...`);
const startImport = performance.now();
const result = await imports.importCsv(csv);
const endImport = performance.now();

if (result.success_count !== TICKET_COUNT) {
  throw new Error(`Expected ${TICKET_COUNT} imported tickets, got ${result.success_count}`);
}
console.log(`Import took ${(endImport - startImport).toFixed(2)}ms`);

console.log(`Running ${ITERATIONS} classify-all iterations...`);
const startClassify = performance.now();
for (let i = 0; i < ITERATIONS; i++) {
  const results = await classification.classifyAll();
  if (results.length !== TICKET_COUNT) {
    throw new Error(`Expected ${TICKET_COUNT} classifications, got ${results.length}`);
  }
}
const totalTime = performance.now() - startClassify;

console.log(`Total classify time: ${totalTime.toFixed(2)}ms`);
console.log(`Average classify-all per iteration: ${(totalTime / ITERATIONS).toFixed(2)}ms`);
