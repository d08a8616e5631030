import {
  DiscussionPostResponse,
  DiscussionResponse,
  DiscussionTopicResponse,
} from '@discussion/shared-types';
import {
  DiscourseCategory,
  DiscoursePost,
  DiscourseTopic,
} from '@modules/discourse/discourse.schemas';

export function toPostResponse(post: DiscoursePost): DiscussionPostResponse {
  return {
    id: post.id,
    name: post.name,
    username: post.username,
    display_username: post.display_username,
    user_id: post.user_id,
    avatar_template: post.avatar_template,
    created_at: post.created_at,
    cooked: post.cooked,
    topic_id: post.topic_id,
  };
}

export function toTopicResponse(
  topic: DiscourseTopic,
  posts: DiscoursePost[] = [],
): DiscussionTopicResponse {
  return {
    posts: posts.map(toPostResponse),
    id: topic.id,
    title: topic.title,
    fancy_title: topic.fancy_title,
    posts_count: topic.posts_count,
    created_at: topic.created_at,
    slug: topic.slug,
    category_id: topic.category_id,
    username: topic.username,
  };
}

export function toDiscussionResponse(
  category: DiscourseCategory,
  topics: DiscourseTopic[],
): DiscussionResponse {
  return {
    id: category.id,
    name: category.name,
    topics: topics.map((topic) => toTopicResponse(topic)),
  };
}
