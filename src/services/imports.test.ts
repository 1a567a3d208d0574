import { describe, it } from "node:test";
import assert from "node:assert";
import { pino } from "pino";
import { createImportService } from "./imports.js";
import { MemoryTicketStore } from "../store/memory.js";

const logger = pino({ level: "silent" });

const CSV = [
  "customer_id,customer_email,customer_name,subject,description,category,priority,tags,source,browser,device_type",
  "C1,one@example.com,One,Login issue,I cannot log in since yesterday.,account_access,high,login,web_form,Chrome,desktop",
  ",bad-email,Two,Invoice copy,Please send a copy of my invoice.,billing_question,low,,email,,",
  'C3,three@example.com,Three,Dark mode,Please add a dark mode to the app.,feature_request,low,"ui,theme",api,,mobile'
].join("\n");

describe("createImportService", () => {
  it("imports the valid CSV rows and reports the rest", async () => {
    const store = new MemoryTicketStore();
    const svc = createImportService({ store, logger });

    const out = await svc.importCsv(Buffer.from(CSV));
    assert.strictEqual(out.total, 3);
    assert.strictEqual(out.success_count, 2);
    assert.strictEqual(out.error_count, 1);
    assert.deepStrictEqual(out.errors, [
      { row: 2, errors: ["customer_id: customer_id is required", "customer_email: Invalid email format"] }
    ]);

    const stored = await store.list();
    assert.deepStrictEqual(stored.map((t) => t.id), out.imported_ids);
    assert.deepStrictEqual(stored[1].tags, ["ui", "theme"]);
    assert.deepStrictEqual(stored[1].metadata, { source: "api", device_type: "mobile" });
  });

  it("imports rows whose cell count differs from the header", async () => {
    const store = new MemoryTicketStore();
    const csv = [
      CSV.split("\n")[0],
      "C1,one@example.com,One,Login issue,I cannot log in since yesterday.,account_access,high,login,web_form,Chrome,desktop",
      "C2,two@example.com,Two,Invoice copy,Please send a copy of my invoice.,billing_question,low,billing,email",
      "C3,three@example.com,Three,Slow sync,Sync takes minutes to finish.,technical_issue,medium,,api,,tablet,extra"
    ].join("\n");

    const out = await createImportService({ store, logger }).importCsv(Buffer.from(csv));
    assert.deepStrictEqual([out.total, out.success_count, out.error_count], [3, 3, 0]);
    assert.deepStrictEqual(out.errors, []);

    const stored = await store.list();
    assert.deepStrictEqual(stored[1].metadata, { source: "email" });
    assert.deepStrictEqual(stored[2].metadata, { source: "api", device_type: "tablet" });
  });

  it("rejects blank priority and source cells", async () => {
    const store = new MemoryTicketStore();
    const csv = [
      CSV.split("\n")[0],
      "C4,four@example.com,Four,Refund,Please refund my last payment.,billing_question,,,,,"
    ].join("\n");

    const out = await createImportService({ store, logger }).importCsv(Buffer.from(csv));
    assert.deepStrictEqual(out.errors, [
      {
        row: 1,
        errors: [
          "priority: Invalid priority. Must be one of: urgent, high, medium, low",
          "metadata: Invalid source. Must be one of: web_form, email, api, chat, phone"
        ]
      }
    ]);
    assert.strictEqual(out.success_count, 0);
  });

  it("imports JSON arrays", async () => {
    const store = new MemoryTicketStore();
    const json = JSON.stringify([
      {
        customer_id: "J1",
        customer_email: "j1@example.com",
        customer_name: "Jay",
        subject: "Crash on save",
        description: "The editor crashes whenever I save a file.",
        category: "technical_issue",
        priority: "urgent",
        tags: ["editor"],
        metadata: { source: "chat", browser: "Safari" }
      },
      { subject: "incomplete" }
    ]);

    const out = await createImportService({ store, logger }).importJson(Buffer.from(json));
    assert.strictEqual(out.success_count, 1);
    assert.deepStrictEqual(out.errors, [
      {
        row: 2,
        errors: [
          "description: description is required",
          "customer_id: customer_id is required",
          "customer_email: customer_email is required",
          "customer_name: customer_name is required",
          "category: category is required",
          "metadata: metadata is required"
        ]
      }
    ]);
    assert.strictEqual((await store.list())[0].priority, "urgent");
  });

  it("imports XML documents", async () => {
    const store = new MemoryTicketStore();
    const xml = `<tickets>
  <ticket>
    <customer_id>X1</customer_id>
    <customer_email>x1@example.com</customer_email>
    <customer_name>Xan</customer_name>
    <subject>Two-factor codes</subject>
    <description>My 2FA codes are never accepted.</description>
    <category>account_access</category>
    <priority>high</priority>
    <tags><tag>2fa</tag><tag>login</tag></tags>
    <metadata><source>phone</source></metadata>
  </ticket>
</tickets>`;

    const out = await createImportService({ store, logger }).importXml(Buffer.from(xml));
    assert.deepStrictEqual([out.total, out.success_count, out.error_count], [1, 1, 0]);

    const [ticket] = await store.list();
    assert.deepStrictEqual(ticket.tags, ["2fa", "login"]);
    assert.deepStrictEqual(ticket.metadata, { source: "phone" });
  });

  it("reports an unreadable file without creating anything", async () => {
    const store = new MemoryTicketStore();
    const out = await createImportService({ store, logger }).importJson(Buffer.from("not json"));

    assert.strictEqual(out.total, 0);
    assert.strictEqual(out.errors.length, 1);
    assert.strictEqual(out.errors[0].row, 0);
    assert.ok(out.errors[0].errors[0].startsWith("Failed to parse JSON: "));
    assert.deepStrictEqual(await store.list(), []);
  });
});
