import { loadConfidenceConfig, normalizeWeights } from "./confidence";
import { advisoryKeyConfigured, loadAdvisoryConfig, resolveAdvisoryKey } from "./advisory";
import { ConfigError } from "../errors";

test("confidence defaults", () => {
    const config = loadConfidenceConfig({});
    expect(config.qualMin).toBe(20);
    expect(config.qualMax).toBe(200);
    expect(config.dpMin).toBe(10);
    expect(config.dpMax).toBe(100);
    expect(config.weights.vcf).toBeCloseTo(0.4);
    expect(config.weights.cpic).toBeCloseTo(0.45);
    expect(config.weights.llm).toBeCloseTo(0.15);
    expect(Object.isFrozen(config)).toBe(true);
});

test("empty strings count as unset", () => {
    expect(loadConfidenceConfig({ CONF_QUAL_MIN: "", CONF_DP_MAX: "  " })).toMatchObject({ qualMin: 20, dpMax: 100 });
});

test("weights are renormalized to sum to one", () => {
    const config = loadConfidenceConfig({ CONF_W_VCF: "1", CONF_W_CPIC: "1", CONF_W_LLM: "2" });
    expect(config.weights).toEqual({ vcf: 0.25, cpic: 0.25, llm: 0.5 });
});

test("non-positive weight sum falls back to the defaults", () => {
    expect(normalizeWeights({ vcf: 0, cpic: 0, llm: 0 })).toEqual({ vcf: 0.4, cpic: 0.45, llm: 0.15 });
});

test("invalid tunables are fatal", () => {
    expect(() => loadConfidenceConfig({ CONF_QUAL_MIN: "abc" })).toThrow(ConfigError);
    expect(() => loadConfidenceConfig({ CONF_QUAL_MIN: "200" })).toThrow(
        "CONF_QUAL_MIN (200) must be below CONF_QUAL_MAX (200)",
    );
    expect(() => loadConfidenceConfig({ CONF_DP_MIN: "50", CONF_DP_MAX: "40" })).toThrow(ConfigError);
});

test("advisory is disabled without an api key", () => {
    expect(loadAdvisoryConfig({})).toEqual({
        apiKey: null,
        apiKeySecret: null,
        baseUrl: "https://api.openai.com",
        model: "gpt-4.1-mini",
        timeoutMs: 45000,
    });
    expect(loadAdvisoryConfig({ OPENAI_API_KEY: " " }).apiKey).toBeNull();
});

test("advisory settings from the environment", () => {
    const config = loadAdvisoryConfig({
        OPENAI_API_KEY: "test-secret",
        OPENAI_BASE_URL: "http://localhost:8080/",
        OPENAI_MODEL: "local-model",
        ADVISORY_TIMEOUT_MS: "1500",
    });
    expect(config).toEqual({
        apiKey: "test-secret",
        apiKeySecret: null,
        baseUrl: "http://localhost:8080",
        model: "local-model",
        timeoutMs: 1500,
    });
    expect(() => loadAdvisoryConfig({ ADVISORY_TIMEOUT_MS: "-1" })).toThrow(ConfigError);
});

describe("advisory key from a secret", () => {
    test("only the secret id is read from the environment", async () => {
        const config = loadAdvisoryConfig({ OPENAI_API_KEY_SECRET: "pgx/openai-key" });
        expect(config.apiKey).toBeNull();
        expect(config.apiKeySecret).toBe("pgx/openai-key");
        expect(advisoryKeyConfigured(config)).toBe(true);

        const readSecret = jest.fn(async () => "test-secret");
        const resolved = await resolveAdvisoryKey(config, readSecret);
        expect(resolved.apiKey).toBe("test-secret");
        expect(readSecret).toHaveBeenCalledWith("pgx/openai-key");
        expect(Object.isFrozen(resolved)).toBe(true);
    });

    test("a plain key or no key skips the secret lookup", async () => {
        const readSecret = jest.fn(async () => "unused");
        const plain = loadAdvisoryConfig({ OPENAI_API_KEY: "test-secret", OPENAI_API_KEY_SECRET: "pgx/openai-key" });
        expect(await resolveAdvisoryKey(plain, readSecret)).toBe(plain);

        const none = loadAdvisoryConfig({});
        expect(advisoryKeyConfigured(none)).toBe(false);
        expect((await resolveAdvisoryKey(none, readSecret)).apiKey).toBeNull();
        expect(readSecret).not.toHaveBeenCalled();
    });
});
