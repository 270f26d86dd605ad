#!/usr/bin/env node
import arg from "arg";
import fs from "fs";
import {callEntry, compile, CompileResult, Phase} from "./compile";
import {CompileError} from "./compile_error";
import {getOptions, setOptions} from "./options";
import {SourceBuffer} from "./parsing";
import {toWat} from "./wasm";

const USAGE = `Usage: exprc <file> [-o <output>] [--run] [--wat] [--time]

  -o, --output <name>  write the module to <name>.wasm (default: main)
  --run                run the program and print the value it returns
  --wat                print the module in the text format instead of writing it
  --time               print how long each phase took`;

const phaseLabels: {[p in Phase]: [start: string, done: string]} = {
    lex: ["Lexing...", "Lexing"],
    parse: ["Parsing AST...", "AST parsing"],
    generate: ["Generating code...", "Code generation"],
    emit: ["Emitting module...", "Emitting"],
};

export async function main(argv: string[]): Promise<number> {
    const args = arg({
        "--output": String,
        "--run": Boolean,
        "--wat": Boolean,
        "--time": Boolean,
        "--help": Boolean,
        "-o": "--output",
        "-h": "--help",
    }, {argv});

    const file = args._[0];
    if (args["--help"] || file === undefined) {
        console.log(USAGE);
        return args["--help"] ? 0 : 1;
    }
    if (args["--time"]) setOptions({timings: true});

    let source: SourceBuffer;
    try {
        source = new SourceBuffer(fs.readFileSync(file, "utf8"));
    } catch (e) {
        console.error("IO error");
        console.error(e instanceof Error ? e.message : String(e));
        return 1;
    }

    let result: CompileResult;
    try {
        result = compile(source, {}, {
            phaseStart: phase => console.log(phaseLabels[phase][0]),
            phaseEnd: (phase, ms) => {
                if (getOptions().timings) console.log(`${phaseLabels[phase][1]} took: ${ms.toFixed(2)}ms`);
            },
        });
    } catch (e) {
        if (!(e instanceof CompileError)) throw e;
        console.error(e.phase);
        console.error(e.diagnostic(source, file));
        return 1;
    }

    if (args["--wat"]) {
        console.log(await toWat(result.binary));
    } else {
        const outputPath = `${args["--output"] ?? "main"}.wasm`;
        fs.writeFileSync(outputPath, result.binary);
        console.log(`Module compiled. Available at: ./${outputPath}`);
    }

    if (args["--run"]) {
        const value = await callEntry(result.module, getOptions().entryName);
        console.log(`Program returned: ${value}`);
    }
    return 0;
}

if (require.main === module) {
    main(process.argv.slice(2)).then(code => {
        process.exitCode = code;
    }, (e: unknown) => {
        console.error(e instanceof arg.ArgError ? e.message : e);
        process.exitCode = 1;
    });
}
