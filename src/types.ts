import type { GenerationMetadata } from "./quality/metrics";
import type { QualityAnalysis } from "./quality/score";
import type { QuestionRecord, QuestionType } from "./questions/types";

export type JobStatus = "queued" | "processing" | "completed" | "failed";

export interface UploadResponse {
    files: { id: string; name: string }[];
}

export interface StartGenerationRequest {
    file_id: string;
    question_type: QuestionType;
    num_questions: number; // 1..100
    topic?: string;
    difficulty?: "low" | "medium" | "high";
    language?: string;
    temperature?: number; // 0..2
    model?: string;
}

export interface GenerationQueued {
    id: string;
    status: Extract<JobStatus, "queued">;
}

export interface ProcessingStatus {
    id: string;
    status: Extract<JobStatus, "queued" | "processing">;
}

export interface GenerationJobResult {
    questions: QuestionRecord[];
    metadata: GenerationMetadata;
    quality_analysis: QualityAnalysis;
}

export interface CompletedStatus {
    id: string;
    status: Extract<JobStatus, "completed">;
    result: GenerationJobResult;
}

export interface FailedStatus {
    id: string;
    status: Extract<JobStatus, "failed">;
    error: string;
}

export type JobStatusResponse = ProcessingStatus | CompletedStatus | FailedStatus;
