import type { AnswerFormat } from '../interface/Quiz.js'

export function parseQuestionPrompt(questionText: string): string {
    return `Analyze this quiz question and extract key information.

QUESTION TEXT:
${questionText}

Extract and return a JSON object with these fields:
1. "data_url": URL where data needs to be downloaded (or null if no download)
2. "task": Clear description of the calculation/analysis needed
3. "submit_url": URL where the answer should be POSTed
4. "answer_format": "number", "string", "boolean", or "object"

Return ONLY valid JSON, no other text.

Example:
{
    "data_url": "https://example.com/data.pdf",
    "task": "Calculate the sum of the 'amount' column on page 2",
    "submit_url": "https://example.com/submit",
    "answer_format": "number"
}

JSON:`
}

export function directAnswerPrompt(task: string, context: string, answerFormat: AnswerFormat): string {
    return `Answer this question directly.

QUESTION: ${task}

CONTEXT:
${context}

Provide ONLY the answer. Format: ${answerFormat}
No explanation, just the answer.

ANSWER:`
}

export function analysisPrompt(task: string, data: string): string {
    return `You are a data analyst. Analyze the data and answer the question precisely.

TASK: ${task}

DATA:
${data}

INSTRUCTIONS:
1. Read the task carefully
2. Analyze the provided data
3. Calculate or extract the required information
4. Provide ONLY the final answer
5. If it's a number, provide just the number (no commas, no units unless specified)
6. If it's text, provide just the text
7. Do NOT include explanations or reasoning

ANSWER:`
}
