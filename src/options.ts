const DEFAULT = {
    // name of the module, shown in backend errors
    moduleName: "main",
    // name of the generated function, also its export name
    entryName: "main",
    // target triple passed to the backend when emitting
    triple: "wasm32-unknown-unknown",

    // print how long each phase took (command line only)
    timings: false,
} as const;

export type CompilerOptions = {[k in keyof typeof DEFAULT]: (typeof DEFAULT)[k] extends boolean ? boolean : string};

let current: CompilerOptions = DEFAULT;

export function setOptions(options: Partial<CompilerOptions> | "default"): void {
    if (options === "default") {
        current = DEFAULT;
    } else {
        current = {...current, ...options};
    }

    if (current.entryName.length === 0) {
        // an unnamed export could not be called
        current = {...current, entryName: DEFAULT.entryName};
    }
}

export function getOptions(): CompilerOptions {
    return current;
}
