import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString } from 'class-validator';

export class CreatePostDto {
  @ApiProperty()
  @IsString({ message: 'You need to provide a text' })
  @IsNotEmpty({ message: 'You need to provide a text' })
  text!: string;
}
