/**
 * User-facing bot texts
 */
export const HELP_CALLBACK = 'help';

export const STATUS_DOWNLOADING = 'Downloading…';
export const STATUS_UPLOADING = 'Sending the file…';

export function startText(maxFileSizeMb: number): string {
    return [
        '👋 <b>Hi!</b>',
        '',
        'I download videos from YouTube, TikTok, VK and many other sites.',
        'Just send me a <b>link to a video</b> and I will send the file back 📥',
        '',
        `Maximum file size I can send: <b>${maxFileSizeMb} MB</b>.`,
    ].join('\n');
}

export const HELP_TEXT = [
    '📘 <b>How to use the bot</b>',
    '',
    '1. Copy a link to a video (YouTube, TikTok, VK and others).',
    '2. Send the link to me.',
    '3. Wait while I download and prepare the file.',
    '4. The video arrives in the chat; audio-only links arrive as MP3.',
].join('\n');
