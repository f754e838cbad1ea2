export type InterviewEventTopic = "interview.scheduled" | "interview.rescheduled";

export type InterviewEventPayload = {
  interview_id: string;
  candidate_id: string;
  job_position_id: string;
  interview_type: string;
  scheduled_start: string;
  scheduled_end: string;
  interviewer_emails: string[];
  original_interview_id: string | null;
  meeting_details: {
    duration: number;
    timezone: string;
    conflicts: string[];
  };
};

export interface InterviewEventPublisher {
  publish(topic: InterviewEventTopic, payload: InterviewEventPayload): Promise<void>;
}
