/**
 * Selection hints: intent keywords per well-known member base name.
 */
export const SELECTION_KEYWORDS: Readonly<Record<string, Readonly<Record<string, readonly string[]>>>> = {
  sense: {
    get_input: ['input', 'get', 'receive', 'read'],
    find_memories: ['memory', 'remember', 'recall', 'past'],
    parse_input: ['parse', 'understand', 'extract', 'analyze input'],
  },
  act: {
    summarize_text: ['summarize', 'summary', 'brief', 'short'],
    analyze_content: ['analyze', 'analysis', 'examine', 'deep'],
    generate_response: ['generate', 'create', 'write', 'produce'],
    transform_content: ['transform', 'convert', 'change', 'format'],
  },
  feedback: {
    emit_result: ['emit', 'output', 'return', 'simple'],
    learn_from_experience: ['learn', 'remember', 'memory', 'improve'],
    evaluate_quality: ['evaluate', 'score', 'quality', 'rate'],
  },
};
