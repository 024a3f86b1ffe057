export const HELP_PATTERN = /^(ayuda|help|comandos)$/i;

export const GREETING_PATTERN = /^(hola|inicio|buenas|hello)$/i;
