import { Transform } from 'class-transformer';
import { IsInt, IsOptional, IsString, Max, Min } from 'class-validator';

export const DEFAULT_PER_PAGE = 10;

const toInt = ({ value }: { value: unknown }) => {
    const v = parseInt(String(value), 10);
    return isNaN(v) ? undefined : v;
};

export class PaginationQueryDto {
    @IsOptional()
    @Transform(toInt)
    @IsInt()
    @Min(1)
    page?: number;

    @IsOptional()
    @Transform(toInt)
    @IsInt()
    @Min(1)
    @Max(100)
    perPage?: number;

    @IsOptional()
    @IsString()
    search?: string;
}

export interface Paginated<T> {
    items: T[];
    page: number;
    perPage: number;
    total: number;
    totalPages: number;
}

export function pageWindow(query: { page?: number; perPage?: number }) {
    const page = query.page ?? 1;
    const perPage = query.perPage ?? DEFAULT_PER_PAGE;
    return { page, perPage, skip: (page - 1) * perPage, take: perPage };
}

export function toPage<T>(items: T[], total: number, page: number, perPage: number): Paginated<T> {
    return {
        items,
        page,
        perPage,
        total,
        totalPages: Math.ceil(total / perPage),
    };
}

// LIKE pattern for case-insensitive "contains" search, escaping the wildcards
export function likePattern(search: string): string {
    return `%${search.trim().toLowerCase().replace(/[\\%_]/g, ch => `\\${ch}`)}%`;
}
