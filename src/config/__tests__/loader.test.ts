import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { buildConfig, loadConfig, toFileLayout, toLoadOptions } from "../loader.js";

describe("buildConfig", () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
  });

  it("applies defaults", () => {
    delete process.env.GOOGLE_API_KEY;
    const config = buildConfig();
    expect(config.dataFolder).toBe("dataset");
    expect(config.businessFile).toBe("business.csv");
    expect(config.marketingFiles).toEqual({
      Facebook: "Facebook.csv",
      Google: "Google.csv",
      TikTok: "TikTok.csv",
    });
    expect(config.coerceMissingNumeric).toBe(true);
    expect(config.delimiter).toBe(",");
    expect(config.llm).toEqual({
      provider: "gemini",
      model: "gemini-2.5-flash",
      maxOutputTokens: 1000,
      temperature: 0.7,
      timeoutMs: 30000,
    });
  });

  it("resolves the API key from the environment", () => {
    process.env.GOOGLE_API_KEY = "test-secret";
    const config = buildConfig({ llm: { apiKey: "$GOOGLE_API_KEY" } });
    expect(config.llm.apiKey).toBe("test-secret");
  });

  it("leaves the API key unset when its variable is missing", () => {
    delete process.env.GOOGLE_API_KEY;
    const config = buildConfig({ llm: { apiKey: "$GOOGLE_API_KEY" } });
    expect(config.llm.apiKey).toBeUndefined();
  });

  it("takes other strings starting with $ literally", () => {
    delete process.env.data;
    const config = buildConfig({ dataFolder: "$data", delimiter: "$", llm: { model: "$MODEL" } });
    expect(config.dataFolder).toBe("$data");
    expect(config.delimiter).toBe("$");
    expect(config.llm.model).toBe("$MODEL");
  });

  it("rejects invalid values with their path", () => {
    expect(() => buildConfig({ delimiter: ";;" })).toThrow(/Invalid dashboard config \(runtime config\): delimiter:/);
    expect(() => buildConfig({ llm: { temperature: 5 } })).toThrow(/llm\.temperature/);
  });

  it("produces loader and layout views", () => {
    const config = buildConfig({ coerceMissingNumeric: false, dateFormats: ["dd/MM/yyyy"] });
    expect(toLoadOptions(config)).toEqual({
      coerceMissingNumeric: false,
      dateFormats: ["dd/MM/yyyy"],
      delimiter: ",",
    });
    expect(toFileLayout(config).marketingFiles.Google).toBe("Google.csv");
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "marketing-intel-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads and validates a JSON file", async () => {
    const path = join(dir, "dashboard.json");
    await writeFile(
      path,
      JSON.stringify({ dataFolder: "exports", marketingFiles: { Facebook: "meta.csv" }, llm: { provider: "none" } })
    );
    const config = loadConfig(path);
    expect(config.dataFolder).toBe("exports");
    expect(config.marketingFiles).toEqual({ Facebook: "meta.csv" });
    expect(config.llm.provider).toBe("none");
  });

  it("names the file in validation errors", async () => {
    const path = join(dir, "bad.json");
    await writeFile(path, JSON.stringify({ llm: { provider: "openai" } }));
    expect(() => loadConfig(path)).toThrow(`Invalid dashboard config (${path}): llm.provider:`);
  });
});
