export * from "./webhooks/event-publisher";
