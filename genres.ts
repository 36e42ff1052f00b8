import genreNames from './genres.json';

const GENRES: readonly string[] = genreNames;

/*
**  Legacy numeric genre codes (ID3v1 and the Winamp extensions)
*/
export function genreName(id: number): string | undefined {
    return Number.isInteger(id) ? GENRES[id] : undefined;
}

export function genreId(name: string): number | undefined {
    const lowered = name.toLowerCase();
    const index = GENRES.findIndex(genre => genre.toLowerCase() === lowered);
    return index === -1 ? undefined : index;
}

/*
**  Resolves TCON values: "31", "(31)", "(31)Trance" (refinement wins), "(RX)", "(CR)"
*/
export function resolveGenre(value: string): string {
    const match = /^\((\d+|RX|CR)\)(.*)$/.exec(value);
    if (match) {
        const [, reference, refinement] = match;
        if (refinement) {
            return refinement.startsWith('(') ? refinement.substring(1) : refinement;
        }
        switch (reference) {
            case 'RX':
                return 'Remix';
            case 'CR':
                return 'Cover';
            default:
                return genreName(Number(reference)) ?? value;
        }
    }
    if (/^\d+$/.test(value)) {
        return genreName(Number(value)) ?? value;
    }
    return value;
}
