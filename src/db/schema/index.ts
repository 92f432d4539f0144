export * from "./questionPool";
export * from "./question";
export * from "./assessableItem";
export * from "./attempt";
export * from "./scratchAnswer";
export * from "./submission";
export * from "./grade";
export * from "./appeal";
export * from "./discussionPost";
export * from "./verification";
export * from "./enrollment";
export * from "./publicAccessMedia";
export * from "./course";
export * from "./gradingPolicy";
export * from "./assessment";
export * from "./lesson";
export * from "./lessonMedia";
export * from "./mediaWatch";
export * from "./engagement";
export * from "./gradebook";
export * from "./certificateRequest";
