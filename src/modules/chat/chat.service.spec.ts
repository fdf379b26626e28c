import { Test, TestingModule } from "@nestjs/testing";
import { ChatService } from "./chat.service";
import { IntakeDto } from "./dto";
import { ResponseTemplates } from "./response-templates";
import { SessionsService } from "../sessions/sessions.service";
import { TrialSearchService } from "../trials/trial-search.service";
import { Trial, TrialSearchResult } from "../trials/trial.types";
import { ENTITY_EXTRACTOR, INTENT_RESOLVER } from "../nlp/nlp.types";
import { HeuristicIntentResolver } from "../nlp/heuristic-intent-resolver";

const intakeDto = (overrides: Partial<IntakeDto> = {}): IntakeDto => ({
  user_id: "u1",
  cancer_type: "breast cancer",
  stage: "stage 2",
  age: 45,
  sex: "female",
  location: "California",
  ...overrides
});

const trial = (nctId: string, isNationwide = false): Trial => ({
  nctId,
  title: `Study ${nctId}`,
  phase: "Phase 2",
  status: "Recruiting",
  location: "Boston, Massachusetts",
  facility: "Example Center",
  sponsor: "Example Sponsor",
  link: `https://clinicaltrials.gov/study/${nctId}`,
  isNationwide
});

describe("ChatService", () => {
  let chat: ChatService;
  let sessions: SessionsService;
  let intents: HeuristicIntentResolver;
  let search: jest.Mock<Promise<TrialSearchResult>, [string, string | undefined]>;
  let extract: jest.Mock;

  beforeEach(async () => {
    intents = new HeuristicIntentResolver();
    search = jest.fn<Promise<TrialSearchResult>, [string, string | undefined]>(async (_cancerType, location) => ({
      trials: [],
      degraded: false,
      isNationwide: false,
      location
    }));
    extract = jest.fn().mockResolvedValue({});

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ChatService,
        SessionsService,
        { provide: TrialSearchService, useValue: { search } },
        { provide: INTENT_RESOLVER, useValue: intents },
        { provide: ENTITY_EXTRACTOR, useValue: { extract } }
      ]
    }).compile();

    chat = module.get<ChatService>(ChatService);
    sessions = module.get<SessionsService>(SessionsService);
  });

  describe("before intake", () => {
    it("asks for the intake and stores nothing", async () => {
      const result = await chat.handleMessage("u1", "Find me trials");
      expect(result).toEqual({ response: "Please complete the intake form before proceeding.", requires_intake: true });
      expect(sessions.has("u1")).toBe(false);
      expect(search).not.toHaveBeenCalled();
    });
  });

  describe("submitIntake", () => {
    it("acknowledges and completes the intake", async () => {
      const result = await chat.submitIntake(intakeDto({ comorbidities: ["hypertension"] }));
      expect(result).toEqual({
        response:
          "Thank you! Your intake has been recorded for breast cancer in California. Ask me to find clinical trials whenever you're ready.",
        intake_complete: true
      });
      const session = sessions.get("u1");
      expect(session.state).toBe("INTAKE_COMPLETE");
      expect(session.intake).toEqual({
        userId: "u1",
        cancerType: "breast cancer",
        stage: "stage 2",
        age: 45,
        sex: "female",
        location: "California",
        comorbidities: ["hypertension"],
        priorTreatments: []
      });
    });
  });

  describe("endSession", () => {
    it("is idempotent", async () => {
      await chat.submitIntake(intakeDto());
      await expect(chat.endSession("u1")).resolves.toEqual({ status: "session_cleared" });
      await expect(chat.endSession("u1")).resolves.toEqual({ status: "session_cleared" });
      expect(sessions.has("u1")).toBe(false);
    });

    it("succeeds for a user that never had a session", async () => {
      await expect(chat.endSession("ghost")).resolves.toEqual({ status: "session_cleared" });
    });
  });

  describe("handleMessage", () => {
    beforeEach(async () => {
      await chat.submitIntake(intakeDto({ location: "Seattle, WA" }));
    });

    it("replies to a greeting without searching", async () => {
      const result = await chat.handleMessage("u1", "Hi there");
      expect(result).toEqual({ response: ResponseTemplates.GREETING });
      expect(search).not.toHaveBeenCalled();
      expect(sessions.get("u1").turns.map((t) => [t.role, t.text])).toEqual([
        ["user", "Hi there"],
        ["bot", ResponseTemplates.GREETING]
      ]);
    });

    it("asks for clarification on an unknown intent", async () => {
      jest.spyOn(intents, "classify").mockResolvedValueOnce({ intent: "unknown", confidence: "low" });
      const result = await chat.handleMessage("u1", "hmm");
      expect(result).toEqual({ response: ResponseTemplates.CLARIFY });
      expect(search).not.toHaveBeenCalled();
    });

    it("merges extracted entities over the intake per field", async () => {
      extract.mockResolvedValueOnce({ location: "Boston, MA" });
      await chat.handleMessage("u1", "Any trials in Boston, MA?");
      expect(search).toHaveBeenCalledWith("breast cancer", "Boston, MA");
    });

    it("returns trials in wire format and records them on the bot turn", async () => {
      search.mockResolvedValueOnce({ trials: [trial("NCT1")], degraded: false, isNationwide: false, location: "Seattle, WA" });

      const result = await chat.handleMessage("u1", "Show me trials");

      expect(result).toEqual({
        response: "Here is 1 recruiting breast cancer clinical trial near Seattle, WA:",
        degraded: false,
        trials: [
          {
            nct_id: "NCT1",
            title: "Study NCT1",
            phase: "Phase 2",
            status: "Recruiting",
            location: "Boston, Massachusetts",
            facility: "Example Center",
            sponsor: "Example Sponsor",
            link: "https://clinicaltrials.gov/study/NCT1",
            is_nationwide: false
          }
        ]
      });
      const botTurn = sessions.get("u1").turns[1];
      expect(botTurn.trials?.map((t) => t.nctId)).toEqual(["NCT1"]);
    });

    it("flags nationwide results in the reply", async () => {
      search.mockResolvedValueOnce({
        trials: [trial("NCT2", true), trial("NCT3", true)],
        degraded: false,
        isNationwide: true,
        location: "Seattle, WA"
      });
      const result = await chat.handleMessage("u1", "Show me trials");
      expect(result.response).toBe(
        "I couldn't find trials for breast cancer near Seattle, WA, but here are 2 recruiting trials nationwide:"
      );
      expect(result.trials?.every((t) => t.is_nationwide)).toBe(true);
    });

    it("apologizes when the registry is unreachable", async () => {
      search.mockResolvedValueOnce({ trials: [], degraded: true, isNationwide: false, location: "Seattle, WA" });
      const result = await chat.handleMessage("u1", "Show me trials");
      expect(result).toEqual({ response: ResponseTemplates.REGISTRY_UNAVAILABLE, trials: [], degraded: true });
    });

    it("keeps answering politely after the conversation ended", async () => {
      await chat.handleMessage("u1", "bye");
      const result = await chat.handleMessage("u1", "Find more trials");

      expect(result).toEqual({ response: ResponseTemplates.CONVERSATION_ENDED });
      expect(sessions.get("u1").state).toBe("ENDED");
      expect(search).not.toHaveBeenCalled();
      expect(sessions.get("u1").turns).toHaveLength(4);
    });

    it("processes concurrent messages for one user in arrival order", async () => {
      let releaseSearch: () => void = () => undefined;
      search.mockImplementationOnce(
        (_cancerType, location) =>
          new Promise((resolve) => {
            releaseSearch = () => resolve({ trials: [], degraded: false, isNationwide: false, location });
          })
      );

      const first = chat.handleMessage("u1", "Show me trials");
      const second = chat.handleMessage("u1", "Hello");
      await new Promise((resolve) => setImmediate(resolve));
      releaseSearch();
      await Promise.all([first, second]);

      expect(sessions.get("u1").turns.filter((t) => t.role === "user").map((t) => t.text)).toEqual([
        "Show me trials",
        "Hello"
      ]);
    });
  });

  describe("end-to-end conversation", () => {
    it("runs intake, a trial search and a goodbye for u1", async () => {
      const classify = jest.spyOn(intents, "classify");
      extract.mockResolvedValueOnce({ location: "Los Angeles" });

      await chat.submitIntake(intakeDto());

      const found = await chat.handleMessage("u1", "Find me trials in Los Angeles");
      await expect(classify.mock.results[0].value).resolves.toEqual({ intent: "find_trials", confidence: "low" });
      expect(search).toHaveBeenCalledWith("breast cancer", "Los Angeles, CA");
      expect(found).toEqual({
        response: "I couldn't find any recruiting breast cancer trials near Los Angeles, CA or nationwide right now.",
        trials: [],
        degraded: false
      });

      const bye = await chat.handleMessage("u1", "Thanks, bye");
      expect(bye).toEqual({ response: "Goodbye! Feel free to return anytime you need help finding clinical trials." });
      expect(sessions.get("u1").state).toBe("ENDED");
    });
  });
});
