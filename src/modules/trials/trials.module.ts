import { Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { ClinicalTrialsClient, createRegistryHttp, REGISTRY_HTTP } from "./clinical-trials.client";
import { TrialSearchService } from "./trial-search.service";

@Module({
  providers: [
    { provide: REGISTRY_HTTP, inject: [ConfigService], useFactory: createRegistryHttp },
    ClinicalTrialsClient,
    TrialSearchService
  ],
  exports: [TrialSearchService]
})
export class TrialsModule {}
