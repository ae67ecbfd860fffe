export const GENRES = [
  "Romance",
  "Film-Noir",
  "Music",
  "Comedy",
  "Biography",
  "Sport",
  "Drama",
  "Animation",
  "Sci-Fi",
  "Western",
  "War",
  "Adventure",
  "Musical",
  "Action",
  "Horror",
  "Thriller",
  "Fantasy",
  "Mystery",
  "Crime",
  "Family",
  "History",
] as const;

export type Genre = (typeof GENRES)[number];

export const DEFAULT_GENRES: readonly Genre[] = [
  "Action",
  "Adventure",
  "Biography",
  "Comedy",
  "Drama",
  "Horror",
];

/** CSV header names, in file order. */
export const MOVIE_COLUMNS = [
  "year",
  "ActorId",
  "Name",
  "MovieId",
  "Title",
  "genre",
  "Country",
  "gross",
] as const;

export type MovieRecord = {
  year: number;
  actorId: string;
  name: string;
  movieId: string;
  title: string;
  genre: Genre;
  country: string;
  gross: number;
};

export type MovieTableRow = Pick<MovieRecord, "year" | "title" | "genre" | "gross">;

export type GrossCell = {
  year: number;
  genre: Genre;
  gross: number;
};

export function isGenre(value: string): value is Genre {
  return GENRES.some((genre) => genre === value);
}
