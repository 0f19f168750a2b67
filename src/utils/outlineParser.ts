import { SceneOutline } from '../types/scene.js';

const LIST_ITEM = /^\s*(?:[-*]|\d+[.)])\s+(.*)$/;
const FIELD = /^\s*(?:[-*]\s*)?(?:\*\*)?([A-Za-z ]+?)(?:\*\*)?\s*:\s*(?:\*\*)?\s*(.*)$/;
const KNOWN_FIELDS = new Set([
    'beats', 'narrative beats', 'scene title', 'title', 'pov character', 'pov',
    'location', 'primary location', 'target word count', 'estimated word count'
]);

/**
 * Pull scene metadata out of an authored outline. Recognised lines look like
 * `POV Character: Mara`; beats are the list items under a `Beats:` line.
 */
export function parseSceneOutline(
    text: string,
    chapter: number,
    scene: number,
    defaultTargetWords: number
): SceneOutline {
    const outline: SceneOutline = {
        chapter,
        scene,
        title: 'Untitled',
        povCharacter: 'Unknown',
        location: 'Unknown',
        targetWords: defaultTargetWords,
        beats: [],
        text
    };

    let inBeats = false;
    for (const line of text.split(/\r?\n/)) {
        // Under Beats:, list items are beats even when they read like a field
        const item = inBeats ? LIST_ITEM.exec(line) : null;
        if (item) {
            outline.beats.push(item[1].trim());
            continue;
        }

        const field = FIELD.exec(line);
        const key = field ? field[1].trim().toLowerCase() : '';
        if (field && KNOWN_FIELDS.has(key)) {
            const value = field[2].trim();
            inBeats = key === 'beats' || key === 'narrative beats';
            if (inBeats || !value) continue;

            if (key === 'scene title' || key === 'title') {
                outline.title = value;
            } else if (key === 'pov character' || key === 'pov') {
                outline.povCharacter = value;
            } else if (key === 'location' || key === 'primary location') {
                outline.location = value;
            } else if (key === 'target word count' || key === 'estimated word count') {
                const words = parseInt(value.replace(/[,_]/g, ''), 10);
                if (!isNaN(words) && words > 0) outline.targetWords = words;
            }
            continue;
        }

        if (inBeats && line.trim() && !/^\s/.test(line)) {
            inBeats = false;
        }
    }

    return outline;
}
