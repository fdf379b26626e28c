import { Inject, Injectable, Logger } from "@nestjs/common";
import { SessionsService } from "../sessions/sessions.service";
import { PatientIntake, Session, SessionNotFoundError, Turn } from "../sessions/session.types";
import { ENTITY_EXTRACTOR, EntityExtractor, INTENT_RESOLVER, IntentResolver } from "../nlp/nlp.types";
import { TrialSearchService } from "../trials/trial-search.service";
import { Trial } from "../trials/trial.types";
import { EndSessionResponse, IntakeResponse, MessageResponse, toTrialView } from "./chat.types";
import { IntakeDto } from "./dto";
import { ResponseTemplates } from "./response-templates";
import { mergeSearchCriteria } from "./search-criteria";

/**
 * Conversation orchestrator. Every operation for a user runs under that
 * user's session lock, so turns land in the order requests were accepted.
 */
@Injectable()
export class ChatService {
  private readonly logger = new Logger(ChatService.name);

  constructor(
    private readonly sessions: SessionsService,
    private readonly trialSearch: TrialSearchService,
    @Inject(INTENT_RESOLVER) private readonly intents: IntentResolver,
    @Inject(ENTITY_EXTRACTOR) private readonly entities: EntityExtractor
  ) {}

  async submitIntake(dto: IntakeDto): Promise<IntakeResponse> {
    const intake: PatientIntake = {
      userId: dto.user_id,
      cancerType: dto.cancer_type,
      stage: dto.stage,
      age: dto.age,
      sex: dto.sex,
      location: dto.location,
      comorbidities: dto.comorbidities ?? [],
      priorTreatments: dto.prior_treatments ?? []
    };

    return this.sessions.runExclusive(dto.user_id, async () => {
      this.sessions.upsertIntake(dto.user_id, intake);
      this.logger.log(`Intake recorded for ${dto.user_id}`);
      return {
        response: ResponseTemplates.intakeAcknowledged(intake.cancerType, intake.location),
        intake_complete: true
      };
    });
  }

  async handleMessage(userId: string, text: string): Promise<MessageResponse> {
    return this.sessions.runExclusive(userId, () => this.processMessage(userId, text));
  }

  async endSession(userId: string): Promise<EndSessionResponse> {
    return this.sessions.runExclusive(userId, async () => {
      if (this.sessions.clear(userId)) {
        this.logger.log(`Session cleared for ${userId}`);
      }
      return { status: "session_cleared" };
    });
  }

  private async processMessage(userId: string, text: string): Promise<MessageResponse> {
    const session = this.findSession(userId);
    const intake = session?.intake;
    if (!session || session.state === "NEW" || !intake) {
      return { response: ResponseTemplates.REQUIRES_INTAKE, requires_intake: true };
    }

    const userTurn: Turn = { role: "user", text, timestamp: new Date().toISOString() };

    if (session.state === "ENDED") {
      this.record(userId, userTurn, ResponseTemplates.CONVERSATION_ENDED);
      return { response: ResponseTemplates.CONVERSATION_ENDED };
    }

    const { intent, confidence } = await this.intents.classify(text, { intakeComplete: true });
    this.logger.debug(`Intent for ${userId}: ${intent} (${confidence})`);

    switch (intent) {
      case "greeting":
        this.record(userId, userTurn, ResponseTemplates.GREETING);
        return { response: ResponseTemplates.GREETING };

      case "goodbye":
        this.record(userId, userTurn, ResponseTemplates.GOODBYE);
        this.sessions.transition(userId, "ENDED");
        return { response: ResponseTemplates.GOODBYE };

      case "unknown":
        this.record(userId, userTurn, ResponseTemplates.CLARIFY);
        return { response: ResponseTemplates.CLARIFY };

      case "find_trials": {
        const extracted = await this.entities.extract(text);
        const criteria = mergeSearchCriteria(intake, extracted);
        const result = await this.trialSearch.search(criteria.cancerType, criteria.location);
        const response = ResponseTemplates.trialResults(criteria, result);
        this.record(userId, userTurn, response, result.trials);
        return { response, trials: result.trials.map(toTrialView), degraded: result.degraded };
      }
    }
  }

  private findSession(userId: string): Session | undefined {
    try {
      return this.sessions.get(userId);
    } catch (error) {
      if (error instanceof SessionNotFoundError) {
        this.logger.debug(`Message from ${userId} before intake`);
        return undefined;
      }
      throw error;
    }
  }

  private record(userId: string, userTurn: Turn, reply: string, trials?: Trial[]): void {
    const botTurn: Turn = { role: "bot", text: reply, timestamp: new Date().toISOString() };
    if (trials) {
      botTurn.trials = trials;
    }
    this.sessions.appendTurn(userId, userTurn);
    this.sessions.appendTurn(userId, botTurn);
  }
}
