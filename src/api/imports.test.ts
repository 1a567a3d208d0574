import { describe, it, before, after } from "node:test";
import assert from "node:assert";
import { startTestApp, readObject } from "./testing.js";

const CSV = [
  "customer_id,customer_email,customer_name,subject,description,category,priority,tags,source,browser,device_type",
  "C1,one@example.com,One,Login issue,I cannot log in since yesterday.,account_access,high,login,web_form,Chrome,desktop",
  ",bad-email,Two,Invoice copy,Please send a copy of my invoice.,billing_question,low,,email,,"
].join("\n");

function upload(url: string, content: string, filename: string, field = "file"): Promise<Response> {
  const form = new FormData();
  form.append(field, new Blob([content]), filename);
  return fetch(url, { method: "POST", body: form });
}

describe("import routes", () => {
  let ctx: Awaited<ReturnType<typeof startTestApp>>;

  before(async () => {
    ctx = await startTestApp({ UPLOAD_MAX_BYTES: "4096" });
  });

  after(async () => {
    await ctx.close();
  });

  it("imports a CSV upload with partial success", async () => {
    const res = await upload(`${ctx.baseUrl}/import/csv`, CSV, "tickets.csv");
    assert.strictEqual(res.status, 200);
    const body = await readObject(res);
    assert.strictEqual(body.total, 2);
    assert.strictEqual(body.success_count, 1);
    assert.strictEqual(body.error_count, 1);
    assert.deepStrictEqual(body.errors, [
      { row: 2, errors: ["customer_id: customer_id is required", "customer_email: Invalid email format"] }
    ]);
  });

  it("reports an unreadable JSON file as a row-0 error with status 200", async () => {
    const res = await upload(`${ctx.baseUrl}/import/json`, '{"not":"a list"}', "tickets.json");
    assert.strictEqual(res.status, 200);
    assert.deepStrictEqual(await res.json(), {
      total: 0,
      success_count: 0,
      error_count: 0,
      errors: [{ row: 0, errors: ["JSON must be an array of ticket objects"] }],
      imported_ids: []
    });
  });

  it("imports an XML upload", async () => {
    const xml =
      "<tickets><ticket><customer_id>X1</customer_id><customer_email>x@example.com</customer_email>" +
      "<customer_name>Xi</customer_name><subject>Slow pages</subject>" +
      "<description>Every page takes ages to load.</description><category>technical_issue</category>" +
      "<metadata><source>api</source></metadata></ticket></tickets>";
    const body = await readObject(await upload(`${ctx.baseUrl}/import/xml`, xml, "tickets.xml"));
    assert.strictEqual(body.success_count, 1);
    assert.ok(Array.isArray(body.imported_ids));
    assert.strictEqual(body.imported_ids.length, 1);
  });

  it("rejects a file with the wrong extension before parsing", async () => {
    const res = await upload(`${ctx.baseUrl}/import/csv`, CSV, "tickets.txt");
    assert.strictEqual(res.status, 400);
    assert.deepStrictEqual(await res.json(), { error: "File must be a CSV file" });

    const xml = await upload(`${ctx.baseUrl}/import/xml`, "<tickets/>", "tickets.json");
    assert.deepStrictEqual(await xml.json(), { error: "File must be an XML file" });
  });

  it("rejects a request without a file part", async () => {
    const form = new FormData();
    form.append("note", "no attachment");
    const res = await fetch(`${ctx.baseUrl}/import/json`, { method: "POST", body: form });
    assert.strictEqual(res.status, 400);
    assert.deepStrictEqual(await res.json(), { error: "No file uploaded" });
  });

  it("rejects an upload over the size limit", async () => {
    const res = await upload(`${ctx.baseUrl}/import/csv`, "x".repeat(5000), "big.csv");
    assert.strictEqual(res.status, 400);
    assert.deepStrictEqual(await res.json(), { error: "File too large" });
  });
});
