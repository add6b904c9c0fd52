const JOB_ID_MAX = 0xffff_ffff;
const JOB_ID_SPACE = 0x1_0000_0000;
const JOB_ID_HALF = 0x8000_0000;

/**
 * Returns the id after current in the uint32 space, skipping the 0 sentinel on wrap.
 */
export function jobIdNext(current: number): number {
    return current >= JOB_ID_MAX ? 1 : current + 1;
}

/**
 * True when id was issued at or after target, treating the id space as a
 * circle so that 1 follows 0xffffffff.
 */
export function jobIdReached(id: number, target: number): boolean {
    const distance = (((id - target) % JOB_ID_SPACE) + JOB_ID_SPACE) % JOB_ID_SPACE;
    return distance < JOB_ID_HALF;
}
