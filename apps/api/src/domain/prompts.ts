const DEFAULT_TOPIC = 'your question';

function topicLabel(topic: string): string {
    return topic.trim() || DEFAULT_TOPIC;
}

export function welcomeMessage(topic: string): string {
    return `Welcome! Let's work on ${topicLabel(topic)} together. Tell me a little about your company and what you need.`;
}

export function buildSystemPrompt(topic: string, collectedData: Record<string, unknown>): string {
    const lines = [
        `You are a business consultant helping the user with ${topicLabel(topic)}.`,
        'Ask one question at a time and build on what the user has already told you.',
        'Never ask again for information the user has already provided.',
    ];

    if (Object.keys(collectedData).length > 0) {
        lines.push('', 'Information collected so far:', JSON.stringify(collectedData, null, 2));
    }

    return lines.join('\n');
}
