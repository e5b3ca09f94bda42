const SECTION_BREAK = /(?=\d+\.\s|Conclusion:)/;
const NUMBERED_SECTION = /^\d+\.\s/;
const CONCLUSION_LABEL = 'Conclusion:';

/**
 * Turns a long model answer into markdown points: numbered sections get a
 * bold heading and the trailing conclusion is set apart.
 */
export function formatResponseAsPoints(text: string): string {
    const formatted: string[] = [];

    for (const rawSection of text.trim().split(SECTION_BREAK)) {
        const section = rawSection.trim();
        if (!section) continue;

        if (NUMBERED_SECTION.test(section)) {
            const colon = section.indexOf(':');
            if (colon === -1) {
                formatted.push(`**${section}**`);
            } else {
                formatted.push(`**${section.slice(0, colon).trim()}**: ${section.slice(colon + 1).trim()}`);
            }
        } else if (section.toLowerCase().startsWith('conclusion')) {
            formatted.push(`\n**Conclusion**: ${section.slice(CONCLUSION_LABEL.length).trim()}`);
        } else {
            formatted.push(section);
        }
    }

    return formatted.join('\n\n');
}
