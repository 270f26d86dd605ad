import wabt from "wabt";

let toolkit: ReturnType<typeof wabt> | undefined;

function loadWabt(): ReturnType<typeof wabt> {
    // the toolkit is an emscripten module, only instantiate it once
    if (toolkit === undefined) toolkit = wabt();
    return toolkit;
}

/** Render a binary module in the text format */
export async function toWat(binary: Uint8Array): Promise<string> {
    const module = (await loadWabt()).readWasm(binary, {readDebugNames: true});
    try {
        module.validate();
        return module.toText({foldExprs: false, inlineExport: true});
    } finally {
        module.destroy();
    }
}

/** Throws with wabt's message if the binary is not a valid module */
export async function validateWasm(binary: Uint8Array): Promise<void> {
    const module = (await loadWabt()).readWasm(binary, {readDebugNames: true});
    try {
        module.validate();
    } finally {
        module.destroy();
    }
}
