import { CreatePostDto } from './create-post.dto';

export class EditPostDto extends CreatePostDto {}
