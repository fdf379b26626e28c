import { LlmService, LlmUnavailableError } from "../llm/llm.service";
import { ModelEntityExtractor } from "./model-entity-extractor";
import { NoopEntityExtractor } from "./noop-entity-extractor";

describe("ModelEntityExtractor", () => {
  let generateJson: jest.Mock;
  let extractor: ModelEntityExtractor;

  beforeEach(() => {
    generateJson = jest.fn();
    extractor = new ModelEntityExtractor({ generateJson } as unknown as LlmService);
  });

  it("returns only the fields the model found", async () => {
    generateJson.mockResolvedValue({ cancer_type: null, location: "Boston, MA", age: null, sex: null });
    await expect(extractor.extract("any trials in Boston, MA?")).resolves.toEqual({ location: "Boston, MA" });
  });

  it("drops blank strings and coerces a numeric age", async () => {
    generateJson.mockResolvedValue({ cancer_type: "  ", location: "Denver Colorado", age: "52", sex: "Male" });
    await expect(extractor.extract("I'm a 52 year old man in Denver Colorado")).resolves.toEqual({
      location: "Denver Colorado",
      age: 52,
      sex: "male"
    });
  });

  it("ignores an unrecognized sex and a negative age", async () => {
    generateJson.mockResolvedValue({ cancer_type: "melanoma", sex: "unknown", age: -3 });
    await expect(extractor.extract("melanoma")).resolves.toEqual({ cancerType: "melanoma" });
  });

  it("extracts nothing when the model fails", async () => {
    generateJson.mockRejectedValue(new LlmUnavailableError("Empty response from Gemini"));
    await expect(extractor.extract("lung cancer in Austin")).resolves.toEqual({});
  });

  it("extracts nothing when the reply has the wrong shape", async () => {
    generateJson.mockResolvedValue(["breast cancer"]);
    await expect(extractor.extract("breast cancer")).resolves.toEqual({});
  });
});

describe("NoopEntityExtractor", () => {
  it("always returns every field absent", async () => {
    await expect(new NoopEntityExtractor().extract("breast cancer trials in Boston, MA")).resolves.toEqual({});
  });
});
