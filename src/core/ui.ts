export type UI = {
  write(message: string): void;
};

export const consoleUI: UI = {
  write(message) {
    console.log(message.replace(/\n$/, ""));
  },
};

export type BufferUI = UI & { readonly lines: readonly string[] };

export const bufferUI = (): BufferUI => {
  const lines: string[] = [];
  return {
    lines,
    write(message) {
      lines.push(message);
    },
  };
};
