export const topics = {
  analysisSessionCompleted: "analysis.session.completed"
} as const;
