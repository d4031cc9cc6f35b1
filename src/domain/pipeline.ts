import {
  CallOptions,
  ImageAnswer,
  ImageQuestion,
  LocalEvidence,
  RetrievalResult,
  RoutingDecision,
  SynthResult,
  WebEvidence,
} from "./types.js";

export interface QueryRouting {
  /** Never rejects; internal failures resolve to a hybrid decision. */
  route(query: string, options?: CallOptions): Promise<RoutingDecision>;
}

export interface LocalSearch {
  searchLocal(query: string, topK: number, options?: CallOptions): Promise<RetrievalResult<LocalEvidence>>;
}

export interface WebSearch {
  searchWeb(query: string, topK: number, options?: CallOptions): Promise<RetrievalResult<WebEvidence>>;
}

export interface AnswerSynthesis {
  generateAnswer(
    query: string,
    localBlock: string,
    webBlock: string,
    options?: CallOptions,
  ): Promise<SynthResult>;
}

export interface ImageQuestionAnswering {
  answerWithImage(input: ImageQuestion, options?: CallOptions): Promise<ImageAnswer>;
}
