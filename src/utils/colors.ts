// Minimal ANSI styling in place of chalk; respects NO_COLOR / FORCE_COLOR

const ESC = "\x1b[";
const RESET = `${ESC}0m`;

type Style = (text: string) => string;

const wrap = (open: string, close: string = RESET): Style => {
  return (text: string) => `${ESC}${open}m${text}${close}`;
};

const styles = {
  red: wrap("31"),
  green: wrap("32"),
  yellow: wrap("33"),
  blue: wrap("34"),
  magenta: wrap("35"),
  cyan: wrap("36"),
  gray: wrap("90"),
  bold: wrap("1", `${ESC}22m`),
  dim: wrap("2", `${ESC}22m`),
} as const;

export type ColorName = keyof typeof styles;

interface ColorTarget {
  isTTY?: boolean;
}

export const isColorDisabled = (
  stream: ColorTarget = process.stdout,
  env: NodeJS.ProcessEnv = process.env
): boolean => {
  if (env.NO_COLOR || env.FORCE_COLOR === "0") {
    return true;
  }
  if (env.FORCE_COLOR) {
    return false;
  }
  return Boolean(env.CI) || !stream.isTTY;
};

const createColorFunction = (style: Style): Style => {
  return (text: string): string => (isColorDisabled() ? text : style(text));
};

export const lightColors = {
  red: createColorFunction(styles.red),
  green: createColorFunction(styles.green),
  yellow: createColorFunction(styles.yellow),
  blue: createColorFunction(styles.blue),
  magenta: createColorFunction(styles.magenta),
  cyan: createColorFunction(styles.cyan),
  gray: createColorFunction(styles.gray),
  bold: createColorFunction(styles.bold),
  dim: createColorFunction(styles.dim),

  strip: (text: string): string => {
    // eslint-disable-next-line no-control-regex
    return text.replace(/\x1b\[[0-9;]*m/g, "");
  },
} satisfies Record<ColorName | "strip", Style>;

export default lightColors;
