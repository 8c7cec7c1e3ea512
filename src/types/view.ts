export type View = "input" | "dashboard" | "preview" | "generate";
