import { IsEmail, IsEnum, IsOptional, IsString, Matches, MaxLength, MinLength } from 'class-validator';
import { Role } from '../role.enum';

export class CreateUserDto {
    @IsString()
    @Matches(/^[a-z0-9._-]{3,80}$/i, { message: 'username may contain letters, digits, dot, dash and underscore' })
    username!: string;

    @IsString()
    @MaxLength(120)
    fullName!: string;

    @IsOptional()
    @IsEmail()
    email?: string;

    @IsString()
    @MinLength(8)
    password!: string;

    @IsOptional()
    @IsEnum(Role)
    role?: Role;
}
