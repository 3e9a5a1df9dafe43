#!/usr/bin/env node

/**
 * pasvmc CLI Entry Point
 *
 * Usage: pasvmc <program.json> [options]
 */

import * as fs from "fs";
import * as path from "path";
import { compileToVM } from "../compiler/CodeGenerator";

function main(): void {
    const args = process.argv.slice(2);

    if (args.length === 0) {
        console.log("pasvmc - Stack machine code generator for typed Pascal ASTs");
        console.log("");
        console.log("Usage: pasvmc <program.json> [options]");
        console.log("");
        console.log("Options:");
        console.log("  --print        Also print the generated code");
        console.log("  -o <file>      Output file path (default: <input>.vm)");
        process.exit(1);
    }

    // Parse arguments
    const inputFile = args[0];
    const printListing = args.includes("--print");

    let outputFile: string | undefined;
    const outputIdx = args.indexOf("-o");
    if (outputIdx !== -1 && args[outputIdx + 1]) {
        outputFile = args[outputIdx + 1];
    }

    // Resolve input path
    const inputPath = path.resolve(inputFile);

    if (!fs.existsSync(inputPath)) {
        console.error(`Error: File not found: ${inputPath}`);
        process.exit(1);
    }

    console.log(`Compiling: ${inputPath}`);

    try {
        const code = compileToVM(inputPath);

        const parsedPath = path.parse(inputPath);
        const outputPath = outputFile ? path.resolve(outputFile) : path.join(parsedPath.dir, `${parsedPath.name}.vm`);
        fs.writeFileSync(outputPath, code);
        console.log(`Generated: ${outputPath}`);

        if (printListing) {
            console.log("\n--- VM code ---");
            console.log(code);
        }
    } catch (error) {
        if (error instanceof Error) {
            console.error(`Error: ${error.message}`);
        } else {
            console.error("Unknown error occurred");
        }
        process.exit(1);
    }
}

main();
