export const EOL = '\n';
export const DOUBLE_EOL = EOL + EOL;
