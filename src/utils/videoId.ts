const VIDEO_ID_PATTERN = /^[a-zA-Z0-9_-]{11}$/;
const LOOSE_VIDEO_ID_PATTERN =
    /(?:v=|\/videos\/|embed\/|youtu\.be\/|\/v\/|\/e\/|watch\?v=|&v=|\.be\/)([a-zA-Z0-9_-]{11})/;

const PATH_MARKERS = ['youtube.com/embed/', 'youtube.com/v/', 'youtube.com/shorts/', 'youtube.com/live/'];

export const isValidVideoId = (value: string): boolean => VIDEO_ID_PATTERN.test(value);

const segmentAfter = (url: string, marker: string): string =>
    url.slice(url.indexOf(marker) + marker.length).split(/[?&#]/)[0] ?? '';

function queryParam(url: string, name: string): string | null {
    const queryStart = url.indexOf('?');
    if (queryStart === -1) {
        return null;
    }
    const query = url.slice(queryStart + 1).split('#')[0] ?? '';
    return new URLSearchParams(query).get(name);
}

/**
 * Extracts the video ID from any of the usual YouTube URL shapes
 * (watch, youtu.be, embed, /v/, shorts, live) or from a bare ID.
 */
export function extractVideoId(input: string): string | null {
    const url = input.trim();
    let id: string | null = null;

    const pathMarker = PATH_MARKERS.find(marker => url.includes(marker));

    if (url.includes('youtu.be/')) {
        id = segmentAfter(url, 'youtu.be/');
    } else if (url.includes('youtube.com/watch?v=')) {
        id = queryParam(url, 'v');
    } else if (pathMarker) {
        id = segmentAfter(url, pathMarker);
    } else {
        const match = url.match(LOOSE_VIDEO_ID_PATTERN);
        if (match && match[1]) {
            id = match[1];
        } else if (isValidVideoId(url)) {
            id = url;
        }
    }

    return id ? id : null;
}

export const watchUrl = (videoId: string) => `https://www.youtube.com/watch?v=${videoId}`;
