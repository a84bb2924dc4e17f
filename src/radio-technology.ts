import { z } from 'zod';
import rawTable from './radio-technologies.json';

const RadioTechnologySchema = z.object({
    key: z.string(),
    aliases: z.array(z.string()),
    code: z.string(),
    id: z.number().int(),
    generation: z.enum(['2G', '3G', '4G', '5G NSA', '5G SA'])
});

const RadioTechnologyTableSchema = z.object({
    technologies: z.array(RadioTechnologySchema)
});

export type RadioTechnology = z.infer<typeof RadioTechnologySchema>;
export type RadioGeneration = RadioTechnology['generation'];

const DEVICE_PREFIX = 'CTRadioAccessTechnology';

const lookup = new Map<string, RadioTechnology>();
for (const technology of RadioTechnologyTableSchema.parse(rawTable).technologies) {
    for (const name of [technology.key, technology.code, ...technology.aliases]) {
        lookup.set(name.toLowerCase(), technology);
    }
}

/**
 * Resolve a device-reported technology name ("LTE", "CTRadioAccessTechnologyNRNSA",
 * "4G/LTE", ...) to its table entry.
 */
export function resolveRadioTechnology(name: string | undefined): RadioTechnology | undefined {
    if (!name) return undefined;
    const trimmed = name.trim();
    const bare = trimmed.startsWith(DEVICE_PREFIX) ? trimmed.slice(DEVICE_PREFIX.length) : trimmed;
    return lookup.get(bare.toLowerCase());
}

export function radioGeneration(name: string | undefined): RadioGeneration | undefined {
    return resolveRadioTechnology(name)?.generation;
}
