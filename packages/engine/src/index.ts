// Realization
export * from "./realization";

// Candidate generation
export * from "./generation";

// Heuristic scoring
export * from "./scoring";

// Post-hoc checks and reporting
export * from "./analysis";

// Note names (display and input)
export * from "./notation";
