/**
 * Composes the single instruction prompt sent to the model.
 * Both documents are embedded verbatim; nothing here depends on their contents.
 */
export function buildAnalysisPrompt(severityText: string, datasetText: string): string {
  return [
    "You are a cybersecurity expert analyzing vulnerability data. Please analyze the following vulnerability ticket data using the provided severity classification criteria.",
    "",
    "SEVERITY CLASSIFICATION CRITERIA:",
    severityText,
    "",
    "VULNERABILITY TICKET DATA:",
    datasetText,
    "",
    "Please provide:",
    "1. A comprehensive markdown analysis report",
    '2. For each ticket in the JSON data, add a "severity_analysis" object with:',
    "   - initial_severity: Based on the raw data",
    "   - adjusted_severity: Your expert assessment",
    "   - risk_factors: List of factors that increase risk",
    "   - mitigating_factors: List of factors that reduce risk",
    "   - confidence_score: Your confidence in the assessment (0-100)",
    "   - reasoning: Brief explanation of your assessment",
    "",
    "Return your response in the following format:",
    "1. First, provide the markdown analysis report",
    "2. Then, provide the enhanced JSON with severity_analysis added to each ticket, inside a ```json fenced code block",
    "",
    "Separate the markdown and JSON sections clearly.",
  ].join("\n");
}
