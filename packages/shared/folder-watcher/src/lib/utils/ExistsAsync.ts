import {access, constants} from "fs/promises";

/** Non-blocking stand-in for `existsSync`. */
export async function existsAsync(filePath: string): Promise<boolean> {
    try {
        await access(filePath, constants.F_OK);
        return true;
    } catch {
        return false;
    }
}
